import { ExportError } from './ExportError.js'

/**
 * HTTP methods
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

/**
 * API error (non-2xx responses from Power BI, or a request that never got one)
 *
 * A status code of 0 means the request failed before a response arrived
 * (timeout, DNS failure, refused connection).
 */
export class ApiError extends ExportError {
  constructor(
    public readonly statusCode: number,
    public readonly method: HttpMethod,
    public readonly url: string,
    message: string,
    public readonly body?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, `API_ERROR_${statusCode}`, { ...context, statusCode, method, url })
  }

  toUserMessage(): string {
    switch (this.statusCode) {
      case 0:
        return (
          `No response from ${this.method} ${this.url}\n\n` +
          `Error: ${this.message}\n\n` +
          `Check your network connection and try the export again.`
        )

      case 401:
        return (
          `Authentication failed for ${this.method} ${this.url}\n\n` +
          `The Power BI access token was rejected or has expired.\n` +
          `Error: ${this.message}\n\n` +
          `Run the export again to obtain a fresh token.`
        )

      case 403:
        return (
          `Permission denied for ${this.method} ${this.url}\n\n` +
          `The account lacks the rights required for this operation.\n` +
          `Error: ${this.message}`
        )

      case 404:
        return (
          `Resource not found: ${this.method} ${this.url}\n\n` +
          `The dataset or table may have been deleted in Power BI.\n` +
          `Error: ${this.message}`
        )

      case 429:
        return (
          `Rate limit exceeded for ${this.method} ${this.url}\n\n` +
          `Power BI is throttling requests for this dataset.\n\n` +
          `Next steps:\n` +
          `1. Increase the buffer size to send fewer, larger batches\n` +
          `2. Wait a minute before exporting again`
        )

      case 500:
      case 502:
      case 503:
      case 504:
        return (
          `Power BI server error (${this.statusCode})\n\n` +
          `The service encountered an internal error: ${this.message}\n\n` +
          `This is usually temporary. Try again in a few moments.`
        )

      default:
        return (
          `Request failed: ${this.method} ${this.url}\n\n` +
          `Status: ${this.statusCode}\n` +
          `Error: ${this.message}`
        )
    }
  }

  isRetryable(): boolean {
    return this.statusCode === 0 || [429, 502, 503, 504].includes(this.statusCode)
  }

  /**
   * Check if error is client error (4xx)
   */
  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500
  }

  /**
   * Check if error is server error (5xx)
   */
  isServerError(): boolean {
    return this.statusCode >= 500 && this.statusCode < 600
  }
}
