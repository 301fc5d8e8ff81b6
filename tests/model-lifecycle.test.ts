/**
 * End-to-end model lifecycle: configuration, connection manager, DDL,
 * save/get/update/delete and the query log, against the in-memory driver.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { randomUUID } from 'node:crypto'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import {
  Types,
  column,
  createConnectionManager,
  createQueryLogger,
  createTable,
  defineModel,
  loadConfig,
  type ConnectionManager,
} from '../src/index.js'
import { MemoryDriver } from './helpers/memory-driver.js'

describe('model lifecycle', () => {
  let tempDir: string
  let driver: MemoryDriver
  let manager: ConnectionManager

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'pgmodel-e2e-'))
    driver = new MemoryDriver()
  })

  afterEach(async () => {
    await manager.close()
    rmSync(tempDir, { recursive: true, force: true })
  })

  function defineUser() {
    const config = loadConfig(undefined, {
      PGMODEL_MANAGER__KIND: 'single',
      PGMODEL_MANAGER__KEEPALIVE: 'true',
      PGMODEL_QUERYLOG__ENABLED: 'true',
      PGMODEL_QUERYLOG__PATH: join(tempDir, 'queries.jsonl'),
    })
    manager = createConnectionManager(config, driver)
    const User = defineModel({
      name: 'User',
      tableName: 'users',
      connectionManager: manager,
      queryLog: createQueryLogger(config),
      columns: {
        id: column<string>({ key: '_id', type: Types.UUID, primaryKey: true, default: () => randomUUID() }),
        name: column<string>({ type: Types.String(40) }),
        email: column<string>({ type: Types.String() }),
      },
    })
    return { User, logPath: config.queryLog.path }
  }

  it('should round-trip an instance through save and get', async () => {
    const { User } = defineUser()
    await createTable(User)

    const user = User.create({ name: 'foo', email: 'foo@example.com' })
    await user.save()

    const found = await User.getOne({ email: 'foo@example.com' }, { record: false })
    expect(found?.toValues()).toEqual(user.toValues())
  })

  it('should give each instance a distinct generated id', async () => {
    const { User } = defineUser()
    await createTable(User)

    const a = User.create({ name: 'a' })
    const b = User.create({ name: 'b' })
    await a.save()
    await b.save()

    const rows = await User.get(undefined, { records: true })
    expect(new Set(rows.map((row) => row._id)).size).toBe(2)
    expect(a.get('id')).not.toBe(b.get('id'))
  })

  it('should update in place and find nothing after delete', async () => {
    const { User } = defineUser()
    await createTable(User)
    const user = User.create({ name: 'foo' })
    await user.save()

    user.set('name', 'bar')
    await user.save()
    expect(await User.get({ id: user.get('id') })).toEqual([{ _id: user.get('id'), name: 'bar', email: null }])

    await user.delete()
    expect(await User.getOne({ id: user.get('id') })).toBeNull()
    expect(user.state).toBe('detached')
  })

  it('should share one kept-alive connection across operations', async () => {
    const { User } = defineUser()
    await createTable(User)
    await User.create({ name: 'foo' }).save()
    await User.get()

    expect(driver.connections).toHaveLength(1)
  })

  it('should write every statement to the query log', async () => {
    const { User, logPath } = defineUser()
    await createTable(User)
    await User.create({ name: 'foo' }).save()

    const kinds = readFileSync(logPath, 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line).kind)
    expect(kinds).toEqual(['raw', 'insert'])
  })
})
