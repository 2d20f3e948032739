import { ExportError } from './ExportError.js'

/**
 * A row value could not be turned into what Power BI expects.
 * Raised for the whole batch: a partially converted row is never sent.
 */
export class FormatError extends ExportError {
  constructor(
    message: string,
    public readonly column?: string,
    public readonly value?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'FORMAT_ERROR', { ...context, column })
  }

  toUserMessage(): string {
    return this.column === undefined ? this.message : `${this.message} (column "${this.column}")`
  }

  isRetryable(): boolean {
    return false
  }
}
