import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { ExporterConfig } from '../../../src/config.js'
import { DATASETS_API, GROUPS_API, TOKEN_ENDPOINT } from '../../../src/constants.js'
import {
  ApiError,
  AuthError,
  ConfigurationError,
  FormatError,
  LifecycleError,
  WorkspaceNotFoundError
} from '../../../src/errors/index.js'
import { PowerBIExporter } from '../../../src/exporter/powerbi-exporter.js'
import type { Schema } from '../../../src/types.js'
import { captureError, captureSyncError } from '../../helpers/errors.js'
import { FakePowerBIService, json, TEST_PASSWORD, TEST_TOKEN } from '../../helpers/fake-powerbi.js'
import { createTestLogger } from '../../helpers/test-logger.js'

const schema: Schema = {
  columns: [
    { name: 'region', type: 'string' },
    { name: 'amount', type: 'double' }
  ]
}

function makeConfig(overrides: Partial<ExporterConfig> = {}): ExporterConfig {
  return {
    credentials: {
      username: 'analyst@example.com',
      password: TEST_PASSWORD,
      clientId: 'test-client',
      clientSecret: 'test-secret'
    },
    dataset: 'Sales',
    tableName: 'dss-data',
    overwrite: true,
    bufferSize: 1000,
    workspace: undefined,
    clearExisting: false,
    ...overrides
  }
}

describe('PowerBIExporter', () => {
  let fake: FakePowerBIService

  beforeEach(() => {
    fake = new FakePowerBIService()
  })

  function createExporter(overrides: Partial<ExporterConfig> = {}): PowerBIExporter {
    return new PowerBIExporter(makeConfig(overrides), { http: fake, logger: createTestLogger() })
  }

  async function openExporter(
    overrides: Partial<ExporterConfig> = {},
    exportSchema: Schema = schema
  ): Promise<PowerBIExporter> {
    const exporter = createExporter(overrides)
    await exporter.initialize()
    await exporter.open(exportSchema)
    return exporter
  }

  describe('overwrite export', () => {
    beforeEach(() => {
      fake.addDataset('Sales')
      fake.addDataset('Sales')
      fake.addDataset('Other')
    })

    it('replaces every dataset with the same name and pushes the rows', async () => {
      const exporter = await openExporter({ bufferSize: 2 })

      await exporter.writeRow(['north', 10.5])
      await exporter.writeRow(['south', 4])
      await exporter.writeRow(['east', 7.25])
      const summary = await exporter.close()

      expect(fake.requests.map((request) => `${request.method} ${request.url}`)).toEqual([
        `POST ${TOKEN_ENDPOINT}`,
        `GET ${DATASETS_API}`,
        `DELETE ${DATASETS_API}/existing-1`,
        `DELETE ${DATASETS_API}/existing-2`,
        `POST ${DATASETS_API}`,
        `POST ${DATASETS_API}/created-4/tables/dss-data/rows`
      ])
      expect(fake.datasets.map((dataset) => dataset.id)).toEqual(['existing-3', 'created-4'])
      expect(fake.batches).toEqual([
        {
          datasetId: 'created-4',
          table: 'dss-data',
          rows: [
            { region: 'north', amount: 10.5 },
            { region: 'south', amount: 4 },
            { region: 'east', amount: 7.25 }
          ]
        }
      ])
      expect(summary).toEqual({
        datasetId: 'created-4',
        workspaceId: undefined,
        rowsWritten: 3,
        batchesSent: 1,
        dashboardUrl: 'https://app.powerbi.com/groups/me/datasets/created-4'
      })
    })

    it('flushes once the buffer grows past its size and again on close', async () => {
      const exporter = await openExporter({ bufferSize: 1 })

      await exporter.writeRow(['north', 1])
      expect(fake.batches).toHaveLength(0)
      await exporter.writeRow(['south', 2])
      expect(fake.batches).toHaveLength(1)
      await exporter.writeRow(['east', 3])
      const summary = await exporter.close()

      expect(fake.batches.map((batch) => batch.rows.length)).toEqual([2, 1])
      expect(summary.rowsWritten).toBe(3)
      expect(summary.batchesSent).toBe(2)
    })

    it('creates the table with columns mapped from the schema', async () => {
      await openExporter()

      expect(fake.datasets[1]?.tables).toEqual([
        {
          name: 'dss-data',
          columns: [
            { name: 'region', dataType: 'String' },
            { name: 'amount', dataType: 'Double' }
          ]
        }
      ])
    })
  })

  describe('reusing a dataset', () => {
    it('writes into the first dataset with the name without touching it', async () => {
      fake.addDataset('Sales')
      fake.addDataset('Sales')

      const exporter = await openExporter({ overwrite: false })
      await exporter.writeRow(['north', 1])
      const summary = await exporter.close()

      expect(summary.datasetId).toBe('existing-1')
      expect(fake.requestsTo('POST', DATASETS_API)).toHaveLength(0)
      expect(fake.requests.filter((request) => request.method === 'DELETE')).toHaveLength(0)
      expect(fake.batches[0]?.datasetId).toBe('existing-1')
    })

    it('raises ConfigurationError when no dataset has the name', async () => {
      fake.addDataset('Inventory')
      const exporter = createExporter({ overwrite: false })
      await exporter.initialize()

      const error = await captureError(exporter.open(schema), ConfigurationError)

      expect(error.message).toBe('No existing dataset with name Sales')
      expect(error.issues).toEqual(["Check 'Overwrite' to create a new one"])
      expect(exporter.getState()).toBe('initialized')
    })

    it('empties the table first when asked to', async () => {
      fake.addDataset('Sales')

      await openExporter({ overwrite: false, clearExisting: true })

      expect(fake.clearedTables).toEqual([{ datasetId: 'existing-1', table: 'dss-data' }])
      expect(fake.datasets).toHaveLength(1)
    })

    it('keeps going when the table cannot be emptied', async () => {
      fake.addDataset('Sales')
      fake.respondWith(
        'DELETE',
        `${DATASETS_API}/existing-1/tables/dss-data/rows`,
        json(403, { error: { message: 'Not allowed' } })
      )

      const exporter = await openExporter({ overwrite: false, clearExisting: true })

      expect(exporter.getState()).toBe('opened')
    })

    it('does not empty tables when overwriting', async () => {
      fake.addDataset('Sales')

      await openExporter({ overwrite: true, clearExisting: true })

      expect(fake.clearedTables).toEqual([])
    })
  })

  describe('workspaces', () => {
    it('exports into the named workspace', async () => {
      fake.addWorkspace('ws-9', 'Finance')
      fake.addDataset('Sales', 'ws-9')

      const exporter = await openExporter({ workspace: 'finance' })
      await exporter.writeRow(['north', 1])
      const summary = await exporter.close()

      expect(fake.requestsTo('DELETE', `${GROUPS_API}/ws-9/datasets/existing-1`)).toHaveLength(1)
      expect(fake.datasets).toEqual([
        {
          id: 'created-2',
          name: 'Sales',
          workspaceId: 'ws-9',
          tables: [
            {
              name: 'dss-data',
              columns: [
                { name: 'region', dataType: 'String' },
                { name: 'amount', dataType: 'Double' }
              ]
            }
          ]
        }
      ])
      expect(summary).toEqual({
        datasetId: 'created-2',
        workspaceId: 'ws-9',
        rowsWritten: 1,
        batchesSent: 1,
        dashboardUrl: 'https://app.powerbi.com/groups/ws-9/datasets/created-2'
      })
    })

    it('changes nothing when the workspace does not exist', async () => {
      fake.addWorkspace('ws-9', 'Finance')
      fake.addDataset('Sales')
      const exporter = createExporter({ workspace: 'Marketing' })
      await exporter.initialize()

      await captureError(exporter.open(schema), WorkspaceNotFoundError)

      expect(fake.requests.map((request) => `${request.method} ${request.url}`)).toEqual([
        `POST ${TOKEN_ENDPOINT}`,
        `GET ${GROUPS_API}`
      ])
      expect(fake.datasets.map((dataset) => dataset.id)).toEqual(['existing-1'])
    })
  })

  describe('initialize()', () => {
    it('stops before any dataset request when credentials are rejected', async () => {
      const exporter = createExporter({
        credentials: {
          username: 'analyst@example.com',
          password: 'wrong-password',
          clientId: 'test-client',
          clientSecret: 'test-secret'
        }
      })

      const error = await captureError(exporter.initialize(), AuthError)

      expect(error.message).toBe(
        'Error 400 while retrieving access token: ' +
          '{"error":"invalid_grant","error_description":"AADSTS50126: Error validating credentials"}'
      )
      expect(fake.requests).toHaveLength(1)
      expect(exporter.getState()).toBe('created')
    })

    it('uses an injected token provider', async () => {
      const authenticate = vi.fn(async () => TEST_TOKEN)
      const exporter = new PowerBIExporter(makeConfig(), {
        http: fake,
        logger: createTestLogger(),
        authenticate
      })

      await exporter.initialize()
      await exporter.open(schema)

      expect(authenticate).toHaveBeenCalledOnce()
      expect(fake.requestsTo('POST', TOKEN_ENDPOINT)).toHaveLength(0)
      expect(exporter.getState()).toBe('opened')
    })
  })

  describe('writeRow()', () => {
    it('rejects rows whose width differs from the schema', async () => {
      const exporter = await openExporter()

      const error = await captureError(exporter.writeRow(['north']), FormatError)

      expect(error.message).toBe('Row 0 has 1 values but the schema has 2 columns')
    })

    it('counts rows when reporting a width mismatch', async () => {
      const exporter = await openExporter()
      await exporter.writeRow(['north', 1])

      const error = await captureError(exporter.writeRow(['south', 2, 3]), FormatError)

      expect(error.message).toBe('Row 1 has 3 values but the schema has 2 columns')
    })

    it('formats dates and missing booleans before sending', async () => {
      const exporter = await openExporter({}, {
        columns: [
          { name: 'when', type: 'date' },
          { name: 'ok', type: 'boolean' },
          { name: 'note', type: 'string' }
        ]
      })

      await exporter.writeRow([new Date('2024-01-02T03:04:05.000Z'), Number.NaN, 'first'])
      await exporter.writeRow([null, false, 'second'])
      await exporter.close()

      expect(fake.batches[0]?.rows).toEqual([
        { when: '2024-01-02T03:04:05.000Z', ok: null, note: 'first' },
        { when: null, ok: false, note: 'second' }
      ])
    })

    it('keeps batches already sent when a later flush fails', async () => {
      const exporter = await openExporter({ bufferSize: 1 })
      await exporter.writeRow(['north', 1])
      await exporter.writeRow(['south', 2])

      fake.respondWith(
        'POST',
        `${DATASETS_API}/created-1/tables/dss-data/rows`,
        json(500, { error: { message: 'Backend down' } })
      )
      await exporter.writeRow(['east', 3])
      const error = await captureError(exporter.writeRow(['west', 4]), ApiError)

      expect(error.message).toBe('Error 500: Backend down')
      expect(fake.batches).toHaveLength(1)
      expect(fake.batches[0]?.rows).toEqual([
        { region: 'north', amount: 1 },
        { region: 'south', amount: 2 }
      ])
    })
  })

  describe('lifecycle', () => {
    it('starts in the created state', () => {
      expect(createExporter().getState()).toBe('created')
    })

    it('refuses to open before initializing', async () => {
      const error = await captureError(createExporter().open(schema), LifecycleError)

      expect(error.message).toBe('Cannot open while the exporter is created')
    })

    it('refuses rows before open', async () => {
      const exporter = createExporter()
      await exporter.initialize()

      const error = await captureError(exporter.writeRow(['north', 1]), LifecycleError)

      expect(error.message).toBe('Cannot write rows while the exporter is initialized')
    })

    it('refuses to initialize twice', async () => {
      const exporter = createExporter()
      await exporter.initialize()

      const error = await captureError(exporter.initialize(), LifecycleError)

      expect(error.message).toBe('Cannot initialize while the exporter is initialized')
    })

    it('refuses to close twice', async () => {
      const exporter = await openExporter()
      await exporter.close()

      const error = await captureError(exporter.close(), LifecycleError)

      expect(error.message).toBe('Cannot close while the exporter is closed')
      expect(exporter.getState()).toBe('closed')
    })

    it('closes an empty export without pushing rows', async () => {
      const exporter = await openExporter()

      const summary = await exporter.close()

      expect(summary.rowsWritten).toBe(0)
      expect(summary.batchesSent).toBe(0)
      expect(fake.batches).toEqual([])
    })
  })

  describe('fromHostConfig()', () => {
    it('builds the exporter from host settings', () => {
      const exporter = PowerBIExporter.fromHostConfig({
        username: 'analyst@example.com',
        password: TEST_PASSWORD,
        'client-id': 'test-client',
        'client-secret': 'test-secret',
        dataset: 'Sales',
        overwrite: 'true',
        buffer_size: '2'
      })

      expect(exporter.config).toEqual(
        makeConfig({ overwrite: true, bufferSize: 2, clearExisting: false })
      )
    })

    it('rejects incomplete settings', () => {
      const error = captureSyncError(
        () => PowerBIExporter.fromHostConfig({ username: 'analyst@example.com' }),
        ConfigurationError
      )

      expect(error.issues).toContain('dataset: dataset is required')
    })
  })
})
