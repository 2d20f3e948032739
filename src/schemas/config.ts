import { z } from 'zod'
import { DEFAULT_BUFFER_SIZE } from '../constants.js'

const requiredString = (label: string) =>
  z.string({ error: `${label} is required` }).trim().min(1, `${label} must not be empty`)

const flag = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .transform((value) => value === true || value === 'true')

/**
 * Exporter settings as the host platform hands them over (its own key names)
 */
export const RawExporterConfigSchema = z.object({
  username: requiredString('username'),
  password: z.string({ error: 'password is required' }).min(1, 'password must not be empty'),
  'client-id': requiredString('client-id'),
  'client-secret': requiredString('client-secret'),
  dataset: requiredString('dataset'),
  overwrite: flag.default(false),
  buffer_size: z.coerce
    .number()
    .int('buffer_size must be a whole number')
    .positive('buffer_size must be greater than 0')
    .default(DEFAULT_BUFFER_SIZE),
  workspace: z
    .string()
    .nullish()
    .transform((value) => value?.trim() || undefined),
  clear_existing: flag.default(false)
})

export type RawExporterConfig = z.input<typeof RawExporterConfigSchema>

const ColumnSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1)
})

export const SchemaSchema = z.object({
  columns: z.array(ColumnSchema)
})

/**
 * File consumed by the command line: a schema and its rows as tuples
 */
export const ExportFileSchema = z
  .object({
    schema: SchemaSchema,
    rows: z.array(z.array(z.unknown()))
  })
  .superRefine((file, ctx) => {
    const width = file.schema.columns.length
    file.rows.forEach((row, index) => {
      if (row.length !== width) {
        ctx.addIssue({
          code: 'custom',
          path: ['rows', index],
          message: `expected ${width} values, got ${row.length}`
        })
      }
    })
  })

export type ExportFile = z.infer<typeof ExportFileSchema>
