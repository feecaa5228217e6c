/**
 * Basic Reconciliation Example
 *
 * Runs the pipeline over in-memory tables and prints the output rows. It shows how to:
 * - Supply the constituent, email and donation tables
 * - Plug in a tag mapping service (a fixed list here)
 * - Read the output rows and the run statistics
 */

import {
  DonorReconcile,
  constituentsToCsv,
  createConsoleLogger,
  createStaticTagMappingService,
  tagCountsToCsv,
  type SourceTables,
} from '../src/index'

const tables: SourceTables = {
  constituents: [
    {
      'Patron ID': '1',
      'First Name': 'Jane',
      'Last Name': 'Doe',
      Salutation: 'Ms',
      Tags: 'Donor, Gala 2023',
      'Primary Email': 'jane.doe@example.com',
      'Date Entered': '2021-03-15',
    },
    {
      'Patron ID': '1',
      'First Name': 'Jane',
      'Date Entered': '2019-01-01',
    },
    {
      'Patron ID': '2',
      Company: 'Example Foundation',
      Tags: 'Grantmaker',
      'Date Entered': '2020-11-02 09:00:00',
      'Job Title': 'Program Officer',
    },
  ],
  emails: [
    { 'Patron ID': '1', Email: 'jane@work.example.com' },
    { 'Patron ID': '2', Email: 'grants@foundation.example.org' },
  ],
  donations: [
    { 'Patron ID': '1', Status: 'Paid', 'Donation Amount': '$50.00', 'Donation Date': '2022-12-01' },
    { 'Patron ID': '1', Status: 'Paid', 'Donation Amount': '$125.00', 'Donation Date': '2023-06-10' },
    { 'Patron ID': '2', Status: 'Paid', 'Donation Amount': '$5,000.00', 'Donation Date': '2023-01-20' },
  ],
}

async function main() {
  const pipeline = DonorReconcile.create()
    .tagMapping(
      createStaticTagMappingService([
        { name: 'Gala 2023', mappedName: 'Event Attendee' },
        { name: 'Grantmaker', mappedName: 'Institutional' },
      ])
    )
    .logger(createConsoleLogger('warn'))
    .build()

  const result = await pipeline.run(tables)

  console.log(constituentsToCsv(result.constituents))
  console.log('')
  console.log(tagCountsToCsv(result.tagCounts))
  console.log('')
  console.log(`Duplicates removed: ${result.stats.duplicatesRemoved}`)
  console.log(`Tag mapping source: ${result.stats.tagMapping.source}`)
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
