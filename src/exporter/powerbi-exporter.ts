/**
 * PowerBIExporter - host-facing export adapter
 *
 * Lifecycle: `initialize()` once, `open(schema)` once, `writeRow()` per row,
 * `close()` once. Rows are buffered and pushed whenever the buffer grows past
 * the configured size; each push is an independent request, so a failure
 * leaves earlier batches in place.
 */

import { type ExporterConfig, parseExporterConfig } from '../config.js'
import { ConfigurationError, FormatError, LifecycleError } from '../errors/index.js'
import { authenticate, type AuthenticateOptions } from '../services/auth.js'
import type { HttpService } from '../services/http/index.js'
import { PowerBIClient, type PowerBIClientOptions } from '../services/powerbi-client.js'
import type { RetryConfig } from '../services/retry/RetryService.js'
import type {
  AccessToken,
  Credentials,
  ExportSummary,
  RowObject,
  RowTuple,
  Schema
} from '../types.js'
import type { Logger } from '../utils/logger.js'
import { sharedLogger } from '../utils/shared-logger.js'

export interface PowerBIExporterDeps {
  logger?: Logger
  http?: HttpService
  retry?: Partial<RetryConfig>
  timeoutMs?: number
  authenticate?: (credentials: Credentials, options: AuthenticateOptions) => Promise<AccessToken>
  createClient?: (token: AccessToken, options: PowerBIClientOptions) => PowerBIClient
}

type Session =
  | { state: 'created' }
  | { state: 'initialized'; client: PowerBIClient }
  | {
      state: 'opened'
      client: PowerBIClient
      columnNames: string[]
      datasetId: string
      workspaceId?: string
    }
  | { state: 'closed'; summary: ExportSummary }

export type ExporterState = Session['state']

export class PowerBIExporter {
  private session: Session = { state: 'created' }
  private buffer: RowObject[] = []
  private rowIndex = 0
  private rowsWritten = 0
  private batchesSent = 0
  private readonly logger: Logger

  constructor(
    readonly config: ExporterConfig,
    private readonly deps: PowerBIExporterDeps = {}
  ) {
    this.logger = (deps.logger ?? sharedLogger).child('powerbi-exporter')
  }

  /**
   * Build an exporter from host settings (`client-id`, `buffer_size`, ...)
   *
   * @throws {ConfigurationError} when the settings are invalid
   */
  static fromHostConfig(raw: unknown, deps: PowerBIExporterDeps = {}): PowerBIExporter {
    return new PowerBIExporter(parseExporterConfig(raw), deps)
  }

  getState(): ExporterState {
    return this.session.state
  }

  /**
   * Authenticate. Must succeed before anything is changed in Power BI.
   *
   * @throws {AuthError} on rejected credentials; the export cannot continue
   */
  async initialize(): Promise<void> {
    if (this.session.state !== 'created') {
      throw new LifecycleError('initialize', this.session.state)
    }

    const authenticateFn = this.deps.authenticate ?? authenticate
    const token = await authenticateFn(this.config.credentials, {
      http: this.deps.http,
      logger: this.deps.logger
    })

    const clientOptions: PowerBIClientOptions = {
      http: this.deps.http,
      logger: this.deps.logger,
      retry: this.deps.retry,
      timeoutMs: this.deps.timeoutMs
    }
    const client = this.deps.createClient
      ? this.deps.createClient(token, clientOptions)
      : new PowerBIClient(token, clientOptions)

    this.session = { state: 'initialized', client }
    this.logger.info('Authenticated against Power BI')
  }

  /**
   * Bind the dataset rows will be written to.
   *
   * With overwrite on, every dataset carrying the configured name is deleted
   * and a fresh one is created from the schema. Otherwise the first dataset
   * with that name is reused.
   *
   * @throws {ConfigurationError} when no dataset can be reused and overwrite is off
   * @throws {WorkspaceNotFoundError} when the configured workspace is unknown
   */
  async open(schema: Schema): Promise<void> {
    if (this.session.state !== 'initialized') {
      throw new LifecycleError('open', this.session.state)
    }

    const { client } = this.session
    const { dataset, tableName } = this.config

    const workspaceId = await client.resolveWorkspaceId(this.config.workspace)
    client.registerFormattableColumns(schema)

    const datasetId = this.config.overwrite
      ? await this.recreateDataset(client, schema, workspaceId)
      : await this.reuseDataset(client, workspaceId)

    this.session = {
      state: 'opened',
      client,
      columnNames: schema.columns.map((column) => column.name),
      datasetId,
      workspaceId
    }
    this.logger.info('Exporting to Power BI dataset', {
      dataset,
      datasetId,
      table: tableName,
      workspaceId
    })
  }

  /**
   * Buffer one row, pushing the buffer once it exceeds the configured size
   *
   * @throws {FormatError} when the row does not match the schema width
   */
  async writeRow(row: RowTuple): Promise<void> {
    if (this.session.state !== 'opened') {
      throw new LifecycleError('write rows', this.session.state)
    }

    const { columnNames } = this.session
    if (row.length !== columnNames.length) {
      throw new FormatError(
        `Row ${this.rowIndex} has ${row.length} values but the schema has ${columnNames.length} columns`,
        undefined,
        row
      )
    }

    const rowObject: RowObject = {}
    columnNames.forEach((name, index) => {
      rowObject[name] = row[index]
    })
    this.buffer.push(rowObject)

    if (this.buffer.length > this.config.bufferSize) {
      await this.flush()
    }
    this.rowIndex++
  }

  /**
   * Push the remaining rows and report where the data landed
   */
  async close(): Promise<ExportSummary> {
    if (this.session.state !== 'opened') {
      throw new LifecycleError('close', this.session.state)
    }

    if (this.buffer.length > 0) {
      await this.flush()
    }

    const { client, datasetId, workspaceId } = this.session
    const summary: ExportSummary = {
      datasetId,
      workspaceId,
      rowsWritten: this.rowsWritten,
      batchesSent: this.batchesSent,
      dashboardUrl: client.dashboardUrl(datasetId, workspaceId)
    }

    this.session = { state: 'closed', summary }
    this.logger.info('Loading complete', { ...summary })
    this.logger.info(`Your Power BI dataset should be available at: ${summary.dashboardUrl}`)
    return summary
  }

  private async flush(): Promise<void> {
    if (this.session.state !== 'opened') {
      throw new LifecycleError('flush rows', this.session.state)
    }

    const { client, datasetId, workspaceId } = this.session
    const rows = this.buffer

    await client.insertRows(rows, datasetId, this.config.tableName, workspaceId)

    this.buffer = []
    this.rowsWritten += rows.length
    this.batchesSent++
    this.logger.info('Inserted records', { count: rows.length, total: this.rowsWritten })
  }

  private async recreateDataset(
    client: PowerBIClient,
    schema: Schema,
    workspaceId?: string
  ): Promise<string> {
    const { dataset, tableName } = this.config

    this.logger.info('Looking for Power BI datasets with similar names', { dataset })
    const existing = await client.findDatasetsByName(dataset, workspaceId)
    for (const datasetId of existing) {
      await client.deleteDataset(datasetId, workspaceId)
    }

    const created = await client.createDataset(dataset, tableName, schema, workspaceId)
    return created.id
  }

  private async reuseDataset(client: PowerBIClient, workspaceId?: string): Promise<string> {
    const { dataset, tableName } = this.config

    const existing = await client.findDatasetsByName(dataset, workspaceId)
    const [datasetId] = existing
    if (datasetId === undefined) {
      throw new ConfigurationError(`No existing dataset with name ${dataset}`, [
        "Check 'Overwrite' to create a new one"
      ])
    }

    if (existing.length > 1) {
      this.logger.warn('Several datasets share this name; using the first', {
        dataset,
        datasetIds: existing
      })
    }

    if (this.config.clearExisting) {
      await client.clearTable(datasetId, tableName, workspaceId)
    }

    return datasetId
  }
}
