#!/usr/bin/env node

import { isExportError } from './errors/index.js'
import { runExport } from './run-export.js'
import { sharedLogger } from './utils/shared-logger.js'

const USAGE =
  'Usage: powerbi-export <file.json>\n\n' +
  'The file holds { "schema": { "columns": [{ "name", "type" }] }, "rows": [[...], ...] }.\n' +
  'Settings come from POWERBI_USERNAME, POWERBI_PASSWORD, POWERBI_CLIENT_ID,\n' +
  'POWERBI_CLIENT_SECRET, POWERBI_DATASET, POWERBI_OVERWRITE, POWERBI_BUFFER_SIZE,\n' +
  'POWERBI_WORKSPACE and POWERBI_CLEAR_EXISTING.'

async function main(): Promise<void> {
  const path = process.argv[2]
  if (!path || path === '--help' || path === '-h') {
    console.error(USAGE)
    process.exit(path ? 0 : 1)
  }

  const summary = await runExport(path, process.env, { logger: sharedLogger })
  console.error('='.repeat(80))
  console.error('Your Power BI dataset should be available at:')
  console.error(summary.dashboardUrl)
  console.error('='.repeat(80))
}

main().catch((error: unknown) => {
  if (isExportError(error)) {
    sharedLogger.error('Export failed', { code: error.code }, error)
    console.error(error.toUserMessage())
  } else {
    sharedLogger.error('Export failed', {}, error instanceof Error ? error : undefined)
  }
  process.exit(1)
})
