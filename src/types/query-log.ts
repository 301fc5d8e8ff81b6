import { Type, type Static } from '@sinclair/typebox'

/** Kind of statement recorded in the query log */
export const QueryKindSchema = Type.Union([
  Type.Literal('select'),
  Type.Literal('insert'),
  Type.Literal('update'),
  Type.Literal('delete'),
  Type.Literal('raw'),
])

export type QueryKind = Static<typeof QueryKindSchema>

/** Query log entry schema, one per JSONL line */
export const QueryLogEntrySchema = Type.Object({
  sequence: Type.Number(),
  timestamp: Type.String(),
  model: Type.String(),
  kind: QueryKindSchema,
  sql: Type.String(),
  args: Type.Array(Type.Unknown()),
})

export type QueryLogEntry = Static<typeof QueryLogEntrySchema>
