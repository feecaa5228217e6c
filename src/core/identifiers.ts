import type { SourceRow, SourceTableName } from '../types/record'
import { MissingIdentifierError } from '../utils/errors'
import { cleanString } from './normalizers/basic'

/**
 * Reads the identifier of a row.
 *
 * @throws MissingIdentifierError when the identifier cell is missing or blank
 */
export function readIdentifier(
  row: SourceRow,
  column: string,
  table: SourceTableName,
  rowIndex: number
): string {
  const id = cleanString(row[column])
  if (!id) {
    throw new MissingIdentifierError(table, rowIndex, column)
  }
  return id
}
