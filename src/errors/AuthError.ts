import { ExportError } from './ExportError.js'

/**
 * Token exchange with Azure AD failed or returned no access token.
 * Keeps the provider's raw response: it names the actual cause
 * (bad password, wrong tenant, MFA required, unknown client).
 */
export class AuthError extends ExportError {
  constructor(
    message: string,
    public readonly response?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'AUTH_ERROR', context)
  }

  toUserMessage(): string {
    if (this.response === undefined) {
      return this.message
    }
    return `${this.message}\n\nAzure authentication API response:\n${this.describeResponse()}`
  }

  isRetryable(): boolean {
    return false
  }

  override getSuggestions(): string[] {
    return [
      'Check the username and password',
      'Check the client id and client secret of the Azure AD application',
      'Accounts with multi-factor authentication cannot use the password grant'
    ]
  }

  private describeResponse(): string {
    if (typeof this.response === 'string') {
      return this.response
    }
    return JSON.stringify(this.response, null, 4)
  }
}
