import { describe, expect, it } from 'vitest'
import {
  buildColumnDefinitions,
  buildCreateDatasetPayload,
  mapColumnType
} from '../../../src/services/type-mapping.js'

describe('mapColumnType', () => {
  it.each([
    ['boolean', 'Boolean'],
    ['tinyint', 'Int64'],
    ['smallint', 'Int64'],
    ['int', 'Int64'],
    ['bigint', 'Int64'],
    ['float', 'Double'],
    ['double', 'Double'],
    ['date', 'dateTime'],
    ['string', 'String'],
    ['array', 'String'],
    ['map', 'String'],
    ['object', 'String']
  ])('maps %s to %s', (type, expected) => {
    expect(mapColumnType(type)).toBe(expected)
  })

  it('exports unknown types as text', () => {
    expect(mapColumnType('geopoint')).toBe('String')
  })

  it('does not resolve inherited object keys', () => {
    expect(mapColumnType('toString')).toBe('String')
  })
})

describe('buildColumnDefinitions', () => {
  it('keeps column order and names', () => {
    expect(
      buildColumnDefinitions({
        columns: [
          { name: 'b', type: 'bigint' },
          { name: 'a', type: 'date' }
        ]
      })
    ).toEqual([
      { name: 'b', dataType: 'Int64' },
      { name: 'a', dataType: 'dateTime' }
    ])
  })
})

describe('buildCreateDatasetPayload', () => {
  it('describes a push-streaming dataset with one table', () => {
    expect(
      buildCreateDatasetPayload('Sales', 'dss-data', { columns: [{ name: 'n', type: 'int' }] })
    ).toEqual({
      name: 'Sales',
      defaultMode: 'PushStreaming',
      tables: [{ name: 'dss-data', columns: [{ name: 'n', dataType: 'Int64' }] }]
    })
  })

  it('allows an empty schema', () => {
    expect(buildCreateDatasetPayload('Empty', 'dss-data', { columns: [] }).tables[0]?.columns).toEqual(
      []
    )
  })
})
