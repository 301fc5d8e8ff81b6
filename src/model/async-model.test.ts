import { describe, it, expect } from 'vitest'
import { ConfigurationError } from '../errors.js'
import { column } from '../columns/column.js'
import type { ConnectionManager, Driver } from '../connection/interface.js'
import { PoolManager } from '../connection/pool.js'
import { SingleConnectionManager } from '../connection/single.js'
import { MemoryQueryLogger, type QueryLogger } from '../logging/query-log.js'
import type { ColumnMap } from '../schema/schema.js'
import { MemoryDriver } from '../../tests/helpers/memory-driver.js'
import { AsyncModelInstance, defineModel, type AsyncModelOptions } from './async-model.js'

interface SetupOptions<M extends ConnectionManager = ConnectionManager> {
  returnRecords?: boolean
  queryLog?: QueryLogger
  manager?: (driver: Driver) => M
}

function setup<M extends ConnectionManager = PoolManager>(options: SetupOptions<M> = {}) {
  const driver = new MemoryDriver()
  driver.db.createTable('users', '_id')
  const manager = options.manager ? options.manager(driver) : new PoolManager(driver)
  let counter = 0
  const User = defineModel({
    name: 'User',
    tableName: 'users',
    connectionManager: manager,
    returnRecords: options.returnRecords,
    queryLog: options.queryLog,
    columns: {
      id: column<number>({ key: '_id', primaryKey: true, default: () => ++counter }),
      name: column<string>(),
      email: column<string>(),
    },
  })
  return { driver, manager, User }
}

describe('AsyncModel', () => {
  describe('save', () => {
    it('should insert a transient instance and mark it persisted', async () => {
      const { driver, User } = setup()
      const user = User.create({ name: 'foo', email: 'foo@example.com' })
      expect(user.state).toBe('transient')

      await user.save()

      expect(user.state).toBe('persisted')
      expect(driver.db.rows('users')).toEqual([{ _id: 1, name: 'foo', email: 'foo@example.com' }])
      expect(driver.db.queries[0].sql).toBe('INSERT INTO users (_id, name, email) VALUES ($1, $2, $3)')
    })

    it('should update a persisted instance', async () => {
      const { driver, User } = setup()
      const user = User.create({ name: 'foo', email: 'foo@example.com' })
      await user.save()

      user.set('name', 'bar')
      await user.save()

      expect(driver.db.queries[1]).toEqual({
        sql: 'UPDATE users SET (_id, name, email) = ($1, $2, $3) WHERE users._id = $4',
        args: [1, 'bar', 'foo@example.com', 1],
      })
      expect(driver.db.rows('users')).toEqual([{ _id: 1, name: 'bar', email: 'foo@example.com' }])
    })

    it('should not fail when updating a row that no longer exists', async () => {
      const { driver, User } = setup()
      const ghost = User.fromRecord({ _id: 99, name: 'ghost', email: null })

      await ghost.save()

      expect(driver.db.rows('users')).toEqual([])
      expect(ghost.state).toBe('persisted')
    })

    it('should surface driver errors and release the connection', async () => {
      const { driver, manager, User } = setup()
      driver.db.failNext(new Error('duplicate key value violates unique constraint'))
      const user = User.create({ name: 'foo' })

      await expect(user.save()).rejects.toThrow('duplicate key value violates unique constraint')

      expect(user.state).toBe('transient')
      expect(manager.inUse).toBe(0)
      expect(driver.pools[0].released).toBe(1)
    })
  })

  describe('concurrent saves', () => {
    const managers: Array<[string, (driver: Driver) => ConnectionManager]> = [
      ['a kept-alive connection', (driver) => new SingleConnectionManager(driver, { keepAlive: true })],
      ['per-scope connections', (driver) => new SingleConnectionManager(driver)],
      ['a pool', (driver) => new PoolManager(driver)],
    ]

    for (const [label, manager] of managers) {
      describe(`over ${label}`, () => {
        it('should commit every overlapping save', async () => {
          const { driver, User } = setup({ manager })

          await Promise.all([
            User.create({ name: 'a' }).save(),
            User.create({ name: 'b' }).save(),
            User.create({ name: 'c' }).save(),
          ])

          expect(driver.db.rows('users').map((row) => row._id)).toEqual([1, 2, 3])
        })

        it('should keep a save that overlaps a failing one', async () => {
          const { driver, User } = setup({ manager })
          await User.create({ name: 'first' }).save()
          const fresh = User.create({ name: 'fresh' })
          const clash = User.create({ id: 1, name: 'clash' })

          const outcomes = await Promise.allSettled([fresh.save(), clash.save()])

          expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'rejected'])
          expect(driver.db.rows('users')).toEqual([
            { _id: 1, name: 'first', email: null },
            { _id: 2, name: 'fresh', email: null },
          ])
          expect([fresh.state, clash.state]).toEqual(['persisted', 'transient'])
        })
      })
    }
  })

  describe('delete', () => {
    it('should delete the row and detach the instance', async () => {
      const { driver, User } = setup()
      const user = User.create({ name: 'foo' })
      await user.save()

      await user.delete()

      expect(user.state).toBe('detached')
      expect(driver.db.rows('users')).toEqual([])
      expect(await User.getOne({ id: 1 })).toBeNull()
      expect(user.get('name')).toBe('foo')
    })

    it('should insert again when a detached instance is saved', async () => {
      const { driver, User } = setup()
      const user = User.create({ name: 'foo' })
      await user.save()
      await user.delete()

      await user.save()

      expect(driver.db.queries[2].sql).toBe('INSERT INTO users (_id, name, email) VALUES ($1, $2, $3)')
      expect(driver.db.rows('users')).toHaveLength(1)
    })
  })

  describe('get', () => {
    it('should return raw rows by default', async () => {
      const { User } = setup()
      await User.create({ name: 'foo', email: 'foo@example.com' }).save()
      await User.create({ name: 'bar', email: 'bar@example.com' }).save()

      const rows = await User.get({ name: 'bar' })

      expect(rows).toEqual([{ _id: 2, name: 'bar', email: 'bar@example.com' }])
    })

    it('should return every row without filters', async () => {
      const { User } = setup()
      await User.create({ name: 'foo' }).save()
      await User.create({ name: 'bar' }).save()
      expect(await User.get()).toHaveLength(2)
    })

    it('should map rows into persisted instances on request', async () => {
      const { driver, User } = setup()
      await User.create({ name: 'foo' }).save()

      const users = await User.get({ name: 'foo' }, { records: false })

      expect(users).toHaveLength(1)
      expect(users[0].get('id')).toBe(1)
      expect(users[0].state).toBe('persisted')

      users[0].set('email', 'foo@example.com')
      await users[0].save()
      expect(driver.db.rows('users')).toEqual([{ _id: 1, name: 'foo', email: 'foo@example.com' }])
    })

    it('should follow the model default when no flag is given', async () => {
      const { User } = setup({ returnRecords: false })
      await User.create({ name: 'foo' }).save()

      const users = await User.get()

      expect(users[0]).toBeInstanceOf(AsyncModelInstance)
    })

    it('should let the flag override the model default', async () => {
      const { User } = setup({ returnRecords: false })
      await User.create({ name: 'foo' }).save()
      expect(await User.get({}, { records: true })).toEqual([{ _id: 1, name: 'foo', email: null }])
    })
  })

  describe('getOne', () => {
    it('should return the first matching row', async () => {
      const { User } = setup()
      await User.create({ name: 'foo' }).save()
      expect(await User.getOne({ name: 'foo' })).toEqual({ _id: 1, name: 'foo', email: null })
    })

    it('should return null when nothing matches', async () => {
      const { User } = setup()
      expect(await User.getOne({ name: 'nobody' })).toBeNull()
    })

    it('should map the row into an instance on request', async () => {
      const { User } = setup()
      await User.create({ name: 'foo' }).save()

      const user = await User.getOne({ _id: 1 }, { record: false })

      expect(user?.get('name')).toBe('foo')
      expect(user?.toString()).toBe("User(id=1, name='foo', email=null)")
    })
  })

  describe('execute', () => {
    it('should run raw SQL and return the command status', async () => {
      const { driver, User } = setup()
      await User.create({ name: 'foo' }).save()

      expect(await User.execute('TRUNCATE TABLE users')).toBe('TRUNCATE')
      expect(driver.db.rows('users')).toEqual([])
    })
  })

  describe('query log', () => {
    it('should log each statement before it runs', async () => {
      const queryLog = new MemoryQueryLogger()
      const { User } = setup({ queryLog })
      const user = User.create({ name: 'foo' })
      await user.save()
      await User.execute('TRUNCATE TABLE users')

      expect(queryLog.entries.map((e) => [e.sequence, e.model, e.kind])).toEqual([
        [1, 'User', 'insert'],
        [2, 'User', 'raw'],
      ])
      expect(queryLog.entries[0].sql).toBe('INSERT INTO users (_id, name, email) VALUES ($1, $2, $3)')
      expect(queryLog.entries[0].args).toEqual([1, 'foo', null])
    })

    it('should log a statement whose execution fails', async () => {
      const queryLog = new MemoryQueryLogger()
      const { driver, User } = setup({ queryLog })
      driver.db.failNext(new Error('connection reset'))

      await expect(User.get()).rejects.toThrow('connection reset')

      expect(queryLog.entries).toHaveLength(1)
      expect(queryLog.entries[0].kind).toBe('select')
    })
  })

  describe('extend', () => {
    it('should inherit the connection manager and return mode', async () => {
      const { driver, manager, User } = setup({ returnRecords: false })
      const Admin = User.extend({ name: 'Admin', columns: { level: column<number>({ default: 1 }) } })
      driver.db.createTable('admin', '_id')

      await Admin.create({ name: 'root' }).save()

      expect(Admin.connection()).toBe(manager)
      expect(Admin.returnRecords).toBe(false)
      expect(driver.db.rows('admin')).toEqual([{ _id: 1, name: 'root', email: null, level: 1 }])
    })
  })

  describe('defineModel', () => {
    it('should expose the bound connection manager', () => {
      const { manager, User } = setup()
      expect(User.connection()).toBe(manager)
    })

    it('should reject a model without connection manager', () => {
      // Untyped callers can leave the manager out.
      const options = { name: 'Loose', columns: {} } as unknown as AsyncModelOptions<ColumnMap>
      try {
        defineModel(options)
        expect.fail('Should have thrown')
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError)
        expect((err as ConfigurationError).code).toBe('MISSING_CONNECTION_MANAGER')
      }
    })
  })
})
