import type {
  ColumnType,
  CreateDatasetPayload,
  DatasetColumnDefinition,
  PowerBIDataType,
  Schema
} from '../types.js'

/**
 * Host column type → Power BI column data type
 */
export const COLUMN_TYPE_MAP = {
  boolean: 'Boolean',
  tinyint: 'Int64',
  smallint: 'Int64',
  int: 'Int64',
  bigint: 'Int64',
  float: 'Double',
  double: 'Double',
  date: 'dateTime',
  string: 'String',
  array: 'String',
  map: 'String',
  object: 'String'
} as const satisfies Record<ColumnType, PowerBIDataType>

function isKnownColumnType(type: string): type is ColumnType {
  return Object.hasOwn(COLUMN_TYPE_MAP, type)
}

/**
 * Map a host column type to its Power BI data type.
 * Types outside the table (custom or newer host types) are exported as text.
 */
export function mapColumnType(type: string): PowerBIDataType {
  if (isKnownColumnType(type)) {
    return COLUMN_TYPE_MAP[type]
  }
  return 'String'
}

export function buildColumnDefinitions(schema: Schema): DatasetColumnDefinition[] {
  return schema.columns.map((column) => ({
    name: column.name,
    dataType: mapColumnType(column.type)
  }))
}

export function buildCreateDatasetPayload(
  name: string,
  tableName: string,
  schema: Schema
): CreateDatasetPayload {
  return {
    name,
    defaultMode: 'PushStreaming',
    tables: [
      {
        name: tableName,
        columns: buildColumnDefinitions(schema)
      }
    ]
  }
}
