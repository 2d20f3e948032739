import { z } from 'zod'

// Power BI returns more fields than the exporter reads; unknown keys are kept.

export const DatasetSchema = z.looseObject({
  id: z.string(),
  name: z.string()
})

export const DatasetListSchema = z.looseObject({
  value: z.array(DatasetSchema).optional()
})

export const CreatedDatasetSchema = z.looseObject({
  id: z.string().min(1),
  name: z.string()
})

export const WorkspaceSchema = z.looseObject({
  id: z.string(),
  name: z.string().optional()
})

export const WorkspaceListSchema = z.looseObject({
  value: z.array(WorkspaceSchema).optional()
})

export const TokenResponseSchema = z.looseObject({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.union([z.string(), z.number()]).optional()
})

/**
 * Error body shape shared by Power BI and Azure AD: `{ error: { message } }`
 */
export const ErrorBodySchema = z.object({
  error: z.object({
    message: z.string()
  })
})

export type DatasetResponse = z.infer<typeof DatasetSchema>
export type WorkspaceResponse = z.infer<typeof WorkspaceSchema>
export type TokenResponse = z.infer<typeof TokenResponseSchema>

export function safeValidate<T extends z.ZodType>(
  schema: T,
  data: unknown
): { success: true; data: z.infer<T> } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(data)

  if (result.success) {
    return { success: true, data: result.data }
  }

  return { success: false, error: result.error }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}
