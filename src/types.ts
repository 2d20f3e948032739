/**
 * Column types a host platform reports for its schemas.
 * Hosts may send other names; those are exported as text.
 */
export type ColumnType =
  | 'boolean'
  | 'tinyint'
  | 'smallint'
  | 'int'
  | 'bigint'
  | 'float'
  | 'double'
  | 'date'
  | 'string'
  | 'array'
  | 'map'
  | 'object'

/**
 * Power BI push dataset column data types
 */
export type PowerBIDataType = 'Boolean' | 'Int64' | 'Double' | 'dateTime' | 'String'

export interface Column {
  readonly name: string
  // biome-ignore lint/complexity/noBannedTypes: keeps completions for the known names
  readonly type: ColumnType | (string & {})
}

export interface Schema {
  readonly columns: readonly Column[]
}

export type RowTuple = readonly unknown[]

export type RowObject = Record<string, unknown>

export interface Credentials {
  username: string
  password: string
  clientId: string
  clientSecret: string
}

export type AccessToken = string

export interface Dataset {
  id: string
  name: string
  [key: string]: unknown
}

export interface Workspace {
  id: string
  name: string
  [key: string]: unknown
}

export interface DatasetColumnDefinition {
  name: string
  dataType: PowerBIDataType
}

export interface CreateDatasetPayload {
  name: string
  defaultMode: 'PushStreaming'
  tables: Array<{
    name: string
    columns: DatasetColumnDefinition[]
  }>
}

export interface FormattableColumns {
  dateColumns: string[]
  booleanColumns: string[]
}

/**
 * Serializes a batch of rows into a request body
 */
export type RowEncoder = (rows: readonly RowObject[]) => string

export interface ExportSummary {
  datasetId: string
  workspaceId?: string
  rowsWritten: number
  batchesSent: number
  dashboardUrl: string
}
