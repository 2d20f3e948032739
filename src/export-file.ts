import { readFile } from 'node:fs/promises'
import { ConfigurationError, FormatError } from './errors/index.js'
import { formatIssues } from './schemas/api-responses.js'
import { type ExportFile, ExportFileSchema } from './schemas/config.js'
import type { RowTuple, Schema } from './types.js'

/**
 * Turn a JSON cell of a date column into a Date; null and "" stay null
 *
 * @throws {FormatError} for strings or numbers that are not dates
 */
export function decodeDateCell(value: unknown, column: string): Date | null {
  if (value === null || value === undefined || value === '') {
    return null
  }

  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value)
    if (Number.isNaN(date.getTime())) {
      throw new FormatError(`Date '${value}' is not correctly formatted`, column, value)
    }
    return date
  }

  throw new FormatError(`Date '${JSON.stringify(value)}' is not correctly formatted`, column, value)
}

/**
 * Decode one JSON row into the values a host would hand over: native Date
 * objects in date columns, everything else unchanged
 */
export function decodeRow(schema: Schema, row: readonly unknown[]): RowTuple {
  return row.map((value, index) => {
    const column = schema.columns[index]
    return column?.type === 'date' ? decodeDateCell(value, column.name) : value
  })
}

export function parseExportFile(content: string, source = 'export file'): ExportFile {
  let json: unknown
  try {
    json = JSON.parse(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`${source} is not valid JSON: ${reason}`)
  }

  const result = ExportFileSchema.safeParse(json)
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${source}`, formatIssues(result.error))
  }
  return result.data
}

export async function readExportFile(path: string): Promise<ExportFile> {
  const content = await readFile(path, 'utf8')
  return parseExportFile(content, path)
}
