/**
 * PowerBIClient - authenticated client for the Power BI push dataset API
 *
 * Handles all dataset traffic with:
 * - Bearer token and JSON content type on every request
 * - Status classification: errors raise ApiError unless the call is best-effort
 * - Runtime validation of every response body the exporter reads
 * - Per-schema row encoding (date and boolean coercion)
 *
 * @example
 * ```typescript
 * const token = await authenticate(credentials)
 * const client = new PowerBIClient(token, { logger })
 * const [datasetId] = await client.findDatasetsByName('Sales')
 * client.registerFormattableColumns(schema)
 * await client.insertRows(rows, datasetId, DEFAULT_TABLE_NAME)
 * ```
 */

import type { z } from 'zod'
import {
  APP_BASE_URL,
  DATASETS_API,
  DEFAULT_TABLE_NAME,
  DEFAULT_WORKSPACE_NAME,
  ERROR_MESSAGES,
  GROUPS_API,
  HTTP_STATUS
} from '../constants.js'
import { ApiError, type HttpMethod, WorkspaceNotFoundError } from '../errors/index.js'
import {
  CreatedDatasetSchema,
  DatasetListSchema,
  formatIssues,
  safeValidate,
  WorkspaceListSchema
} from '../schemas/api-responses.js'
import type {
  AccessToken,
  Dataset,
  FormattableColumns,
  RowEncoder,
  RowObject,
  Schema
} from '../types.js'
import type { Logger } from '../utils/logger.js'
import { sharedLogger } from '../utils/shared-logger.js'
import { AxiosHttpService, type HttpResponse, type HttpService } from './http/index.js'
import { type ErrorMessageOptions, getErrorMessage, isErrorStatus } from './response-errors.js'
import { ExponentialBackoffRetryService, type RetryConfig } from './retry/RetryService.js'
import { createRowEncoder, findFormattableColumns, plainEncoder } from './row-formatter.js'
import { buildCreateDatasetPayload } from './type-mapping.js'

// ============================================================================
// Type Definitions
// ============================================================================

export interface PowerBIClientOptions {
  /** Transport; defaults to axios with a bounded timeout */
  http?: HttpService
  logger?: Logger
  /** Opt-in retries (none by default) */
  retry?: Partial<RetryConfig>
  /** Request timeout for the default transport */
  timeoutMs?: number
}

interface CheckOptions extends ErrorMessageOptions {
  /** Log and continue instead of raising (best-effort cleanup) */
  failOnError?: boolean
}

export interface DeleteDatasetOptions {
  failOnError?: boolean
}

// ============================================================================
// PowerBIClient Class
// ============================================================================

export class PowerBIClient {
  private readonly http: HttpService
  private readonly retry: ExponentialBackoffRetryService
  private readonly logger: Logger
  private readonly headers: Record<string, string>
  private formattableColumns: FormattableColumns = { dateColumns: [], booleanColumns: [] }
  private encoder: RowEncoder = plainEncoder

  constructor(token: AccessToken, options: PowerBIClientOptions = {}) {
    this.logger = (options.logger ?? sharedLogger).child('powerbi-client')
    this.http = options.http ?? new AxiosHttpService(options.timeoutMs)
    this.retry = new ExponentialBackoffRetryService(options.retry, this.logger)
    this.headers = {
      Authorization: `Bearer ${token}`,
      'Content-Type': 'application/json'
    }
  }

  // ==========================================================================
  // Datasets
  // ==========================================================================

  async listDatasets(workspaceId?: string): Promise<Dataset[]> {
    const url = this.datasetsUrl(workspaceId)
    const response = await this.send('GET', url)
    this.check(response, 'GET', url, {})

    const list = this.parse(DatasetListSchema, response, 'GET', url)
    return list.value ?? []
  }

  /**
   * Ids of every dataset whose name is exactly `name` (case-sensitive).
   * Power BI does not enforce unique names, so several ids may come back.
   */
  async findDatasetsByName(name: string, workspaceId?: string): Promise<string[]> {
    const datasets = await this.listDatasets(workspaceId)
    return datasets.filter((dataset) => dataset.name === name).map((dataset) => dataset.id)
  }

  async deleteDataset(
    datasetId: string,
    workspaceId?: string,
    options: DeleteDatasetOptions = {}
  ): Promise<void> {
    const url = `${this.datasetsUrl(workspaceId)}/${encodeURIComponent(datasetId)}`
    const response = await this.send('DELETE', url)
    const ok = this.check(response, 'DELETE', url, {
      whileTrying: `deleting ${datasetId}`,
      failOnError: options.failOnError ?? true
    })

    if (ok) {
      this.logger.info('Deleted existing Power BI dataset', {
        datasetId,
        status: response.status
      })
    }
  }

  /**
   * Create a push-streaming dataset with one table whose columns mirror the schema
   *
   * @throws {ApiError} on a failed request or a response without a dataset id
   */
  async createDataset(
    name: string,
    tableName: string,
    schema: Schema,
    workspaceId?: string
  ): Promise<Dataset> {
    const url = this.datasetsUrl(workspaceId)
    const payload = buildCreateDatasetPayload(name, tableName, schema)
    const response = await this.send('POST', url, JSON.stringify(payload))
    this.check(response, 'POST', url, {})

    const created = safeValidate(CreatedDatasetSchema, response.data)
    if (!created.success) {
      throw new ApiError(
        response.status,
        'POST',
        url,
        ERROR_MESSAGES.MISSING_DATASET_ID,
        response.data
      )
    }

    this.logger.info('Created Power BI dataset', {
      datasetId: created.data.id,
      name,
      columns: payload.tables[0]?.columns.length ?? 0
    })
    return created.data
  }

  // ==========================================================================
  // Workspaces
  // ==========================================================================

  /**
   * Resolve a workspace (group) name to its id, ignoring case.
   * Empty names and "My workspace" mean the personal workspace: undefined,
   * without a request.
   *
   * @throws {WorkspaceNotFoundError} when the name matches nothing or groups cannot be listed
   */
  async resolveWorkspaceId(workspaceName?: string): Promise<string | undefined> {
    if (!workspaceName || workspaceName === DEFAULT_WORKSPACE_NAME) {
      return undefined
    }

    const response = await this.send('GET', GROUPS_API)

    if (response.status === HTTP_STATUS.UNAUTHORIZED) {
      throw new WorkspaceNotFoundError(workspaceName, ERROR_MESSAGES.GROUPS_UNAUTHORIZED, {
        statusCode: response.status
      })
    }
    if (response.status === HTTP_STATUS.NOT_FOUND) {
      throw new WorkspaceNotFoundError(workspaceName, undefined, { statusCode: response.status })
    }
    this.check(response, 'GET', GROUPS_API, {})

    const list = this.parse(WorkspaceListSchema, response, 'GET', GROUPS_API)
    const wanted = workspaceName.toLowerCase()
    const match = (list.value ?? []).find(
      (workspace) => (workspace.name ?? '').toLowerCase() === wanted
    )

    if (!match) {
      throw new WorkspaceNotFoundError(workspaceName)
    }

    this.logger.debug('Resolved workspace', { workspace: workspaceName, workspaceId: match.id })
    return match.id
  }

  // ==========================================================================
  // Rows
  // ==========================================================================

  /**
   * Remember the schema's date and boolean columns and install the matching
   * row encoder for later inserts
   */
  registerFormattableColumns(schema: Schema): FormattableColumns {
    this.formattableColumns = findFormattableColumns(schema)
    this.encoder = createRowEncoder(this.formattableColumns)
    return this.getFormattableColumns()
  }

  getFormattableColumns(): FormattableColumns {
    return {
      dateColumns: [...this.formattableColumns.dateColumns],
      booleanColumns: [...this.formattableColumns.booleanColumns]
    }
  }

  /**
   * Encode and push a batch of rows into a dataset table
   *
   * @throws {FormatError} when a date value cannot be converted (nothing is sent)
   * @throws {ApiError} when Power BI rejects the batch
   */
  async insertRows(
    rows: readonly RowObject[],
    datasetId: string,
    tableName: string = DEFAULT_TABLE_NAME,
    workspaceId?: string
  ): Promise<void> {
    if (rows.length === 0) {
      return
    }

    const url = this.tableRowsUrl(datasetId, tableName, workspaceId)
    const body = this.encoder(rows)
    const response = await this.send('POST', url, body)
    this.check(response, 'POST', url, {})

    this.logger.debug('Inserted records', { datasetId, count: rows.length, status: response.status })
  }

  /**
   * Delete every row of a table while keeping the dataset (and the reports
   * bound to it). Failures are logged, never raised.
   */
  async clearTable(datasetId: string, tableName: string, workspaceId?: string): Promise<boolean> {
    const url = this.tableRowsUrl(datasetId, tableName, workspaceId)
    const response = await this.send('DELETE', url)
    const ok = this.check(response, 'DELETE', url, { failOnError: false })

    if (ok) {
      this.logger.info('Emptied Power BI table', { datasetId, table: tableName })
    }
    return ok
  }

  // ==========================================================================
  // URLs
  // ==========================================================================

  /**
   * Datasets collection, scoped to a workspace (group) when one is given
   */
  datasetsUrl(workspaceId?: string): string {
    if (workspaceId === undefined) {
      return DATASETS_API
    }
    return `${GROUPS_API}/${encodeURIComponent(workspaceId)}/datasets`
  }

  tableRowsUrl(datasetId: string, tableName: string, workspaceId?: string): string {
    return (
      `${this.datasetsUrl(workspaceId)}/${encodeURIComponent(datasetId)}` +
      `/tables/${encodeURIComponent(tableName)}/rows`
    )
  }

  /**
   * Where the dataset can be opened in the Power BI web app
   */
  dashboardUrl(datasetId: string, workspaceId?: string): string {
    return `${APP_BASE_URL}/groups/${workspaceId ?? 'me'}/datasets/${datasetId}`
  }

  // ==========================================================================
  // Request Helpers
  // ==========================================================================

  private send(method: HttpMethod, url: string, data?: string): Promise<HttpResponse> {
    return this.retry.executeForStatus(
      () => this.http.request({ method, url, headers: this.headers, data }),
      `${method} ${url}`
    )
  }

  /**
   * Classify a response. Error statuses raise ApiError, or are logged and
   * reported as `false` when `failOnError` is off.
   */
  private check(
    response: HttpResponse,
    method: HttpMethod,
    url: string,
    options: CheckOptions
  ): boolean {
    if (!isErrorStatus(response.status)) {
      return true
    }

    const message = getErrorMessage(response, options)

    if (options.failOnError ?? true) {
      throw new ApiError(response.status, method, url, message, response.data)
    }

    this.logger.error(message, { method, url, status: response.status })
    return false
  }

  private parse<T extends z.ZodType>(
    schema: T,
    response: HttpResponse,
    method: HttpMethod,
    url: string
  ): z.infer<T> {
    const result = safeValidate(schema, response.data)
    if (!result.success) {
      throw new ApiError(
        response.status,
        method,
        url,
        `Unexpected response from Power BI: ${formatIssues(result.error).join('; ')}`,
        response.data
      )
    }
    return result.data
  }
}
