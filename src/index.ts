/**
 * Power BI streaming exporter
 *
 * Library entry point. Hosts construct a PowerBIExporter from their settings
 * and drive it through initialize → open → writeRow → close.
 */

export { type ExporterConfig, loadConfigFromEnv, parseExporterConfig } from './config.js'
export {
  API_TIMEOUT,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_TABLE_NAME,
  DEFAULT_WORKSPACE_NAME
} from './constants.js'
export * from './errors/index.js'
export { decodeRow, parseExportFile, readExportFile } from './export-file.js'
export {
  type ExporterState,
  PowerBIExporter,
  type PowerBIExporterDeps
} from './exporter/powerbi-exporter.js'
export { runExport } from './run-export.js'
export { type AuthenticateOptions, authenticate } from './services/auth.js'
export { AxiosHttpService, type HttpResponse, type HttpService } from './services/http/index.js'
export {
  type DeleteDatasetOptions,
  PowerBIClient,
  type PowerBIClientOptions
} from './services/powerbi-client.js'
export type { RetryConfig } from './services/retry/RetryService.js'
export { formatBoolean, formatDate } from './services/row-formatter.js'
export { COLUMN_TYPE_MAP, mapColumnType } from './services/type-mapping.js'
export type * from './types.js'
export { Logger, LogLevel } from './utils/logger.js'
