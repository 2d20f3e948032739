import { ExportError } from './ExportError.js'

export class LifecycleError extends ExportError {
  constructor(
    public readonly operation: string,
    public readonly state: string
  ) {
    super(`Cannot ${operation} while the exporter is ${state}`, 'LIFECYCLE_ERROR', {
      operation,
      state
    })
  }

  toUserMessage(): string {
    return `${this.message}. Call initialize(), open(), writeRow() and close() in that order.`
  }

  isRetryable(): boolean {
    return false
  }
}
