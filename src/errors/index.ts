/**
 * Export Error Hierarchy
 *
 * Structured errors carrying the upstream response where one exists
 */

import type { ApiError } from './ApiError.js'
import type { AuthError } from './AuthError.js'
import type { ConfigurationError } from './ConfigurationError.js'
import type { FormatError } from './FormatError.js'
import type { LifecycleError } from './LifecycleError.js'
import type { WorkspaceNotFoundError } from './WorkspaceNotFoundError.js'

export { ApiError, type HttpMethod } from './ApiError.js'
export { AuthError } from './AuthError.js'
export { ConfigurationError } from './ConfigurationError.js'
export { ExportError, isExportError } from './ExportError.js'
export { FormatError } from './FormatError.js'
export { LifecycleError } from './LifecycleError.js'
export { WorkspaceNotFoundError } from './WorkspaceNotFoundError.js'

/**
 * Discriminated union of all export errors
 */
export type ExportErrorType =
  | ApiError
  | AuthError
  | ConfigurationError
  | FormatError
  | LifecycleError
  | WorkspaceNotFoundError
