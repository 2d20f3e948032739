import { ErrorBodySchema } from '../schemas/api-responses.js'
import { sanitizeMessage } from '../utils/sanitizer.js'
import type { HttpResponse } from './http/index.js'

export interface ErrorMessageOptions {
  /** What the caller was doing, e.g. "deleting 42"; switches to the raw body */
  whileTrying?: string
  /** Human-readable messages keyed by status code, preferred over the body */
  customErrorMessages?: Partial<Record<number, string>>
}

export function isErrorStatus(status: number): boolean {
  return status >= 400
}

/**
 * Raw body as text, the way the service sent it
 */
export function describeBody(data: unknown): string {
  if (data === undefined || data === null) {
    return ''
  }
  if (typeof data === 'string') {
    return data
  }
  return JSON.stringify(data)
}

/**
 * `{ error: { message } }` from a JSON error body, otherwise the raw body text
 */
export function extractErrorMessage(data: unknown): string {
  let body = data
  if (typeof data === 'string') {
    try {
      body = JSON.parse(data)
    } catch {
      return data
    }
  }

  const parsed = ErrorBodySchema.safeParse(body)
  return parsed.success ? parsed.data.error.message : describeBody(data)
}

/**
 * Build the message for a failed response.
 * Priority: custom message for the status > "while <doing>" with raw body > nested error message.
 */
export function getErrorMessage(response: HttpResponse, options: ErrorMessageOptions = {}): string {
  const custom = options.customErrorMessages?.[response.status]
  if (custom !== undefined) {
    return custom
  }

  if (options.whileTrying === undefined) {
    return sanitizeMessage(`Error ${response.status}: ${extractErrorMessage(response.data)}`)
  }

  return sanitizeMessage(
    `Error ${response.status} while ${options.whileTrying}: ${describeBody(response.data)}`
  )
}
