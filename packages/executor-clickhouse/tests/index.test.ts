import { ConnectionError, ExecutionError } from '@stixql/validation'
import { afterEach, describe, expect, it, vi } from 'vitest'

// ── Mock @clickhouse/client ────────────────────────────────────

const mockPing = vi.fn()
const mockQuery = vi.fn()
const mockClose = vi.fn()

vi.mock('@clickhouse/client', () => ({
  createClient: () => ({
    query: mockQuery,
    ping: mockPing,
    close: mockClose,
  }),
}))

function serverError(message: string, type: string): Error {
  return Object.assign(new Error(message), { code: '60', type })
}

// ── Tests ──────────────────────────────────────────────────────

describe('executor-clickhouse', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('ping failure throws ConnectionError', async () => {
    const { createClickHouseExecutor } = await import('../src/index.js')
    const executor = createClickHouseExecutor({ url: 'http://localhost:8123' })

    mockPing.mockResolvedValue({ success: false, error: new Error('refused') })

    try {
      await executor.ping()
      expect.fail('Expected ConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConnectionError)
      const e = err as ConnectionError
      expect(e.code).toBe('CONNECTION_FAILED')
      expect(e.message).toBe('ClickHouse ping failed')
      expect(e.details).toEqual({ url: 'http://localhost:8123' })
    }
  })

  it('ping success does not throw', async () => {
    const { createClickHouseExecutor } = await import('../src/index.js')
    const executor = createClickHouseExecutor({})

    mockPing.mockResolvedValue({ success: true })

    await expect(executor.ping()).resolves.toBeUndefined()
  })

  it('ping network error throws ConnectionError with cause', async () => {
    const { createClickHouseExecutor } = await import('../src/index.js')
    const executor = createClickHouseExecutor({})

    mockPing.mockRejectedValue(new Error('ECONNREFUSED'))

    try {
      await executor.ping()
      expect.fail('Expected ConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConnectionError)
      const e = err as ConnectionError
      expect(e.code).toBe('CONNECTION_FAILED')
      expect((e.cause as Error).message).toBe('ECONNREFUSED')
    }
  })

  it('maps positional params to named query params', async () => {
    const { createClickHouseExecutor } = await import('../src/index.js')
    const executor = createClickHouseExecutor({})

    const json = vi.fn().mockResolvedValue([{ value: '10.0.0.1' }])
    mockQuery.mockResolvedValue({ json })

    const sql = 'SELECT * FROM "ipv4-addr" WHERE ("value" = {p1:String}) AND ("id" IN ({p2:String}, {p3:String}))'
    const rows = await executor.execute(sql, ['10.0.0.1', 'a', 'b'])

    expect(rows).toEqual([{ value: '10.0.0.1' }])
    expect(mockQuery).toHaveBeenCalledWith({
      query: sql,
      query_params: { p1: '10.0.0.1', p2: 'a', p3: 'b' },
      format: 'JSONEachRow',
    })
  })

  it('unknown table maps to UNKNOWN_TABLE', async () => {
    const { createClickHouseExecutor } = await import('../src/index.js')
    const executor = createClickHouseExecutor({})

    mockQuery.mockRejectedValue(serverError('Table default.nosuch does not exist.', 'UNKNOWN_TABLE'))

    try {
      await executor.execute('SELECT * FROM "nosuch"', [])
      expect.fail('Expected ExecutionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ExecutionError)
      const e = err as ExecutionError
      expect(e.code).toBe('UNKNOWN_TABLE')
      expect(e.details).toEqual({
        code: 'UNKNOWN_TABLE',
        dialect: 'clickhouse',
        sql: 'SELECT * FROM "nosuch"',
        table: 'nosuch',
      })
    }
  })

  it('unknown identifier maps to UNKNOWN_COLUMN', async () => {
    const { createClickHouseExecutor } = await import('../src/index.js')
    const executor = createClickHouseExecutor({})

    mockQuery.mockRejectedValue(serverError("Missing columns: 'bogus' while processing query", 'UNKNOWN_IDENTIFIER'))

    try {
      await executor.execute('SELECT "bogus" FROM "url"', [])
      expect.fail('Expected ExecutionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ExecutionError)
      const e = err as ExecutionError
      expect(e.code).toBe('UNKNOWN_COLUMN')
      expect(e.message).toBe('Unknown column on clickhouse backend: bogus')
    }
  })

  it('other errors throw QUERY_FAILED with sql and params', async () => {
    const { createClickHouseExecutor } = await import('../src/index.js')
    const executor = createClickHouseExecutor({})

    mockQuery.mockRejectedValue(new Error('socket hang up'))

    try {
      await executor.execute('SELECT 1 WHERE {p1:Int64} = 1', [1])
      expect.fail('Expected ExecutionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ExecutionError)
      const e = err as ExecutionError
      expect(e.code).toBe('QUERY_FAILED')
      expect(e.details).toEqual({
        code: 'QUERY_FAILED',
        dialect: 'clickhouse',
        sql: 'SELECT 1 WHERE {p1:Int64} = 1',
        params: [1],
      })
    }
  })

  it('close closes the client', async () => {
    const { createClickHouseExecutor } = await import('../src/index.js')
    const executor = createClickHouseExecutor({})

    mockClose.mockResolvedValue(undefined)
    await executor.close()
    expect(mockClose).toHaveBeenCalledTimes(1)
  })
})
