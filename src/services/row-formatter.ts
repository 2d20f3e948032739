/**
 * Row encoders for the table rows endpoint
 *
 * Power BI rejects native temporal values and NaN, so date and boolean
 * columns are rewritten before serialization. Schemas without such
 * columns skip the per-row pass entirely.
 */

import { FormatError } from '../errors/index.js'
import type { FormattableColumns, RowEncoder, RowObject, Schema } from '../types.js'

interface Temporal {
  toISOString(): string
}

function isTemporal(value: unknown): value is Temporal {
  return (
    value !== null &&
    typeof value === 'object' &&
    'toISOString' in value &&
    typeof value.toISOString === 'function'
  )
}

/**
 * Collect the names of date and boolean columns
 */
export function findFormattableColumns(schema: Schema): FormattableColumns {
  const dateColumns: string[] = []
  const booleanColumns: string[] = []

  for (const column of schema.columns) {
    if (column.type === 'date') {
      dateColumns.push(column.name)
    } else if (column.type === 'boolean') {
      booleanColumns.push(column.name)
    }
  }

  return { dateColumns, booleanColumns }
}

export function hasFormattableColumns(columns: FormattableColumns): boolean {
  return columns.dateColumns.length > 0 || columns.booleanColumns.length > 0
}

/**
 * Convert a temporal value to ISO-8601. Missing values and invalid dates
 * (the not-a-time sentinel) become null.
 *
 * @throws {FormatError} when the value is neither empty nor temporal
 */
export function formatDate(value: unknown, column?: string): string | null {
  if (value === null || value === undefined) {
    return null
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString()
  }

  if (isTemporal(value)) {
    return value.toISOString()
  }

  throw new FormatError(`Date '${String(value)}' is not correctly formatted`, column, value)
}

/**
 * Map the NaN sentinel hosts use for missing booleans to null, so that
 * a missing value is not read as false
 */
export function formatBoolean(value: unknown): unknown {
  if (typeof value === 'number' && Number.isNaN(value)) {
    return null
  }
  return value
}

export function formatRow(row: RowObject, columns: FormattableColumns): RowObject {
  const formatted: RowObject = { ...row }

  for (const column of columns.dateColumns) {
    formatted[column] = formatDate(row[column], column)
  }
  for (const column of columns.booleanColumns) {
    formatted[column] = formatBoolean(row[column])
  }

  return formatted
}

export const plainEncoder: RowEncoder = (rows) => JSON.stringify(rows)

export function createFormattingEncoder(columns: FormattableColumns): RowEncoder {
  return (rows) => JSON.stringify(rows.map((row) => formatRow(row, columns)))
}

/**
 * Pick the encoder for a schema: plain JSON unless it has date or boolean columns
 */
export function createRowEncoder(columns: FormattableColumns): RowEncoder {
  return hasFormattableColumns(columns) ? createFormattingEncoder(columns) : plainEncoder
}
