import { Type, type Static } from '@sinclair/typebox'

/** Which connection manager variant to build */
export const ManagerKind = Type.Union([Type.Literal('single'), Type.Literal('pool')])
export type ManagerKind = Static<typeof ManagerKind>

/** Database configuration schema for pgmodel.config.json */
export const DatabaseConfigSchema = Type.Object({
  connection: Type.Object({
    connectionString: Type.Optional(Type.String({ minLength: 1 })),
    host: Type.String({ minLength: 1, default: 'localhost' }),
    port: Type.Number({ minimum: 1, maximum: 65535, default: 5432 }),
    user: Type.String({ default: 'postgres' }),
    password: Type.Optional(Type.String()),
    database: Type.String({ minLength: 1, default: 'postgres' }),
    statementTimeoutMs: Type.Optional(Type.Number({ minimum: 0 })),
  }),
  manager: Type.Object({
    kind: ManagerKind,
    keepAlive: Type.Boolean({ default: false }),
  }),
  pool: Type.Object({
    max: Type.Number({ minimum: 1, default: 10 }),
    idleTimeoutMillis: Type.Number({ minimum: 0, default: 10000 }),
    connectionTimeoutMillis: Type.Number({ minimum: 0, default: 0 }),
  }),
  queryLog: Type.Object({
    enabled: Type.Boolean({ default: false }),
    path: Type.String({ minLength: 1, default: './data/queries.jsonl' }),
  }),
})

export type DatabaseConfig = Static<typeof DatabaseConfigSchema>
