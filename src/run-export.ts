import { loadConfigFromEnv } from './config.js'
import { decodeRow, readExportFile } from './export-file.js'
import { PowerBIExporter, type PowerBIExporterDeps } from './exporter/powerbi-exporter.js'
import type { ExportSummary } from './types.js'

/**
 * Export a JSON file through the full exporter lifecycle, configured from the environment
 */
export async function runExport(
  path: string,
  env: NodeJS.ProcessEnv,
  deps: PowerBIExporterDeps = {}
): Promise<ExportSummary> {
  const config = loadConfigFromEnv(env)
  const file = await readExportFile(path)

  const exporter = new PowerBIExporter(config, deps)
  await exporter.initialize()
  await exporter.open(file.schema)
  for (const row of file.rows) {
    await exporter.writeRow(decodeRow(file.schema, row))
  }
  return exporter.close()
}
