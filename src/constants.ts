/**
 * Constants for the Power BI streaming exporter
 * Using const assertions for literal types and type safety
 */

// ============================================================================
// Endpoints
// ============================================================================

export const TOKEN_ENDPOINT = 'https://login.microsoftonline.com/common/oauth2/token' satisfies string

/**
 * OAuth resource the token is requested for
 */
export const POWERBI_RESOURCE = 'https://analysis.windows.net/powerbi/api' satisfies string

export const API_BASE_URL = 'https://api.powerbi.com/v1.0/myorg' satisfies string
export const GROUPS_API = `${API_BASE_URL}/groups` as const
export const DATASETS_API = `${API_BASE_URL}/datasets` as const

export const APP_BASE_URL = 'https://app.powerbi.com' satisfies string

// ============================================================================
// Export Defaults
// ============================================================================

/**
 * Name of the single table created inside every exported dataset
 */
export const DEFAULT_TABLE_NAME = 'dss-data' satisfies string

/**
 * Workspace name that designates the signed-in user's personal workspace
 */
export const DEFAULT_WORKSPACE_NAME = 'My workspace' satisfies string

export const DEFAULT_BUFFER_SIZE = 1000 satisfies number

export const API_TIMEOUT = 30000 satisfies number // 30 seconds

// ============================================================================
// HTTP Status Codes (as const object with readonly properties)
// ============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  RATE_LIMIT: 429,
  INTERNAL_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504
} as const

/**
 * Type-safe HTTP status code
 */
export type HttpStatusCode = (typeof HTTP_STATUS)[keyof typeof HTTP_STATUS]

// ============================================================================
// Retry Configuration (as const object)
// ============================================================================

/**
 * Exports are not retried unless a caller opts in; a retried row insert
 * can land the same batch twice.
 */
export const RETRY_CONFIG = {
  maxRetries: 0,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  retryableStatuses: [429, 502, 503, 504]
} as const

// ============================================================================
// Error Messages (as const object for consistency)
// ============================================================================

export const ERROR_MESSAGES = {
  GROUPS_UNAUTHORIZED: 'No access to groups/workspaces lists. Please check your access rights.',
  MISSING_TOKEN:
    'Error while retrieving your Power BI access token, please check your credentials.',
  MISSING_DATASET_ID: 'Power BI did not return an id for the created dataset'
} as const

/**
 * Type-safe error message
 */
export type ErrorMessage = (typeof ERROR_MESSAGES)[keyof typeof ERROR_MESSAGES]
