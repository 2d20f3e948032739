import { ExportError } from './ExportError.js'

export class WorkspaceNotFoundError extends ExportError {
  constructor(
    public readonly workspaceName: string,
    message?: string,
    context?: Record<string, unknown>
  ) {
    super(
      message ??
        `The workspace named "${workspaceName}" does not exist on your Power BI account, or you do not have access to it`,
      'WORKSPACE_NOT_FOUND',
      { ...context, workspaceName }
    )
  }

  toUserMessage(): string {
    return this.message
  }

  isRetryable(): boolean {
    return false
  }

  override getSuggestions(): string[] {
    return [
      'Check the spelling of the workspace name (matching ignores case)',
      'Leave the workspace empty to export into "My workspace"'
    ]
  }
}
