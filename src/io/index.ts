export {
  readWorkbook,
  readWorkbookBuffer,
  sheetToRows,
  isDateFormat,
  excelSerialToDate,
  DEFAULT_SHEET_NAMES,
  type SheetNames,
} from './workbook-reader'
export {
  writeOutputTables,
  constituentsToCsv,
  tagCountsToCsv,
  DEFAULT_OUTPUT_FILE_NAMES,
  type OutputFileNames,
  type WrittenOutput,
} from './csv-writer'
