import { DEFAULT_TABLE_NAME } from './constants.js'
import { ConfigurationError } from './errors/index.js'
import { formatIssues } from './schemas/api-responses.js'
import { RawExporterConfigSchema } from './schemas/config.js'
import type { Credentials } from './types.js'

export interface ExporterConfig {
  credentials: Credentials
  /** Name of the Power BI dataset to create or reuse */
  dataset: string
  /** Table inside the dataset; always the default table today */
  tableName: string
  /** Delete every dataset with this name and create a fresh one */
  overwrite: boolean
  /** Rows kept in memory before a flush */
  bufferSize: number
  /** Workspace name; undefined targets "My workspace" */
  workspace?: string
  /** Empty the reused dataset's table before writing (ignored with overwrite) */
  clearExisting: boolean
}

/**
 * Validate host-supplied settings and normalize them into an ExporterConfig
 *
 * @throws {ConfigurationError} listing every invalid or missing setting
 */
export function parseExporterConfig(raw: unknown): ExporterConfig {
  const result = RawExporterConfigSchema.safeParse(raw)

  if (!result.success) {
    throw new ConfigurationError('Invalid exporter configuration', formatIssues(result.error))
  }

  const config = result.data
  return {
    credentials: {
      username: config.username,
      password: config.password,
      clientId: config['client-id'],
      clientSecret: config['client-secret']
    },
    dataset: config.dataset,
    tableName: DEFAULT_TABLE_NAME,
    overwrite: config.overwrite,
    bufferSize: config.buffer_size,
    workspace: config.workspace,
    clearExisting: config.clear_existing
  }
}

/**
 * Build the configuration from POWERBI_* environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv): ExporterConfig {
  return parseExporterConfig({
    username: env.POWERBI_USERNAME,
    password: env.POWERBI_PASSWORD,
    'client-id': env.POWERBI_CLIENT_ID,
    'client-secret': env.POWERBI_CLIENT_SECRET,
    dataset: env.POWERBI_DATASET,
    overwrite: env.POWERBI_OVERWRITE?.toLowerCase(),
    buffer_size: env.POWERBI_BUFFER_SIZE || undefined,
    workspace: env.POWERBI_WORKSPACE,
    clear_existing: env.POWERBI_CLEAR_EXISTING?.toLowerCase()
  })
}
