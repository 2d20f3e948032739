import { ExportError } from './ExportError.js'

export class ConfigurationError extends ExportError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    context?: Record<string, unknown>
  ) {
    super(message, 'CONFIGURATION_ERROR', context)
  }

  toUserMessage(): string {
    if (this.issues.length === 0) {
      return this.message
    }
    return `${this.message}\n${this.issues.map((issue) => `  - ${issue}`).join('\n')}`
  }

  isRetryable(): boolean {
    return false
  }
}
