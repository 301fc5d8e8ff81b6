import { describe, it, expect } from 'vitest'
import { ConfigurationError } from '../errors.js'
import { column } from '../columns/column.js'
import { Types } from '../columns/column-type.js'
import { defineBaseModel } from '../model/base-model.js'
import { defineModel } from '../model/async-model.js'
import { SingleConnectionManager } from '../connection/single.js'
import { MemoryDriver } from '../../tests/helpers/memory-driver.js'
import {
  createTable,
  createTableStatement,
  dropTable,
  dropTableStatement,
  truncateTable,
  truncateTableStatement,
} from './table.js'

function userColumns() {
  return {
    id: column<string>({ key: '_id', type: Types.UUID, primaryKey: true }),
    name: column<string>({ type: Types.String(40) }),
    tags: column<string[]>({ type: Types.Array(Types.String()) }),
  }
}

describe('DDL statements', () => {
  const User = defineBaseModel({ name: 'User', tableName: 'users', columns: userColumns() })

  it('should render CREATE TABLE from the column definitions', () => {
    expect(createTableStatement(User)).toBe(
      'CREATE TABLE IF NOT EXISTS users (_id uuid PRIMARY KEY, name varchar(40), tags text ARRAY)',
    )
  })

  it('should render DROP TABLE with optional CASCADE', () => {
    expect(dropTableStatement(User)).toBe('DROP TABLE IF EXISTS users')
    expect(dropTableStatement(User, { cascade: true })).toBe('DROP TABLE IF EXISTS users CASCADE')
  })

  it('should render TRUNCATE TABLE with optional CASCADE', () => {
    expect(truncateTableStatement(User)).toBe('TRUNCATE TABLE users')
    expect(truncateTableStatement(User, { cascade: true })).toBe('TRUNCATE TABLE users CASCADE')
  })

  it('should reject a column without type', () => {
    const Note = defineBaseModel({ name: 'Note', columns: { body: column<string>() } })
    try {
      createTableStatement(Note)
      expect.fail('Should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError)
      expect((err as ConfigurationError).code).toBe('MISSING_COLUMN_TYPE')
    }
  })
})

describe('DDL execution', () => {
  it('should create, truncate and drop the table through the model', async () => {
    const driver = new MemoryDriver()
    const User = defineModel({
      name: 'User',
      tableName: 'users',
      connectionManager: new SingleConnectionManager(driver),
      columns: userColumns(),
    })

    expect(await createTable(User)).toBe('CREATE')
    await User.create({ id: 'a1', name: 'foo', tags: ['x'] }).save()
    expect(driver.db.rows('users')).toHaveLength(1)

    expect(await truncateTable(User)).toBe('TRUNCATE')
    expect(driver.db.rows('users')).toEqual([])

    expect(await dropTable(User, { cascade: true })).toBe('DROP')
    expect(driver.db.hasTable('users')).toBe(false)
  })
})
