import { ConfigurationError } from '../errors.js'

/**
 * Immutable description of a PostgreSQL column storage type.
 *
 * Only the DDL utilities read it; statement builders never inspect a
 * column's type, and no value is validated against it.
 */
export class ColumnType {
  readonly sqlName: string
  readonly params: readonly (string | number)[]
  private readonly rendered: string

  constructor(sqlName: string, params: readonly (string | number)[] = [], rendered?: string) {
    this.sqlName = sqlName
    this.params = Object.freeze([...params])
    this.rendered = rendered ?? (params.length > 0 ? `${sqlName}(${params.join(', ')})` : sqlName)
    Object.freeze(this)
  }

  /** The type as written in a CREATE TABLE column definition. */
  render(): string {
    return this.rendered
  }

  toString(): string {
    return this.rendered
  }
}

function checkSize(typeName: string, n: number): number {
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(
      'INVALID_COLUMN_TYPE',
      `${typeName} size must be a positive integer, got ${n}`,
    )
  }
  return n
}

/** Options for array column types. */
export interface ArrayTypeOptions {
  /** Declared element count per dimension (PostgreSQL does not enforce it). */
  size?: number
  /** Number of dimensions; renders the `type [n][n]` form when set. */
  dimensions?: number
}

const simple = (sqlName: string): ColumnType => new ColumnType(sqlName)

const UUID = simple('uuid')
const BooleanType = simple('bool')
const Integer = simple('integer')
const NumberType = simple('numeric')
const DateType = simple('date')
const Time = simple('time')
const TZTime = simple('timetz')
const Timestamp = simple('timestamp')
const TZTimestamp = simple('timestamptz')
const TimeInterval = simple('interval')
const BigInteger = simple('int8')
const BigSerial = simple('serial8')
const Binary = simple('bytea')
const Money = simple('money')
const MACAddress = simple('macaddr')
const Box = simple('box')
const Line = simple('line')
const LineSegment = simple('lseg')
const Circle = simple('circle')
const Path = simple('path')
const Point = simple('point')
const Polygon = simple('polygon')
const Double = simple('float8')
const Json = simple('json')
const JsonB = simple('jsonb')
const PGLogSequenceNumber = simple('pg_lsn')
const Real = simple('float4')
const SmallInteger = simple('int2')
const SmallSerial = simple('serial2')
const Serial = simple('serial4')
const TextSearchQuery = simple('tsquery')
const TextSearchVector = simple('tsvector')
const TransactionID = simple('txid_snapshot')
const XML = simple('xml')
const IntegerRange = simple('int4range')
const NumericRange = simple('numrange')
const DateRange = simple('daterange')
const Text = simple('text')

/**
 * Catalogue of PostgreSQL column types.
 *
 * Parameterless types are shared instances; sized types are built per call.
 */
export const Types = {
  /** `varchar(n)` when sized, otherwise `text`. */
  String(n?: number): ColumnType {
    if (n === undefined) return Text
    return new ColumnType('varchar', [checkSize('String', n)])
  },
  UUID,
  Boolean: BooleanType,
  Integer,
  Number: NumberType,
  Date: DateType,
  Time,
  TZTime,
  Timestamp,
  TZTimestamp,
  TimeInterval,
  Array(element: ColumnType, options: ArrayTypeOptions = {}): ColumnType {
    const size = options.size === undefined ? undefined : checkSize('Array', options.size)
    if (options.dimensions !== undefined) {
      const dims = checkSize('Array dimensions', options.dimensions)
      const bracket = `[${size ?? ''}]`
      return new ColumnType('ARRAY', [element.render()], `${element.render()} ${bracket.repeat(dims)}`)
    }
    const suffix = size === undefined ? '' : `[${size}]`
    return new ColumnType('ARRAY', [element.render()], `${element.render()} ARRAY${suffix}`)
  },
  BigInteger,
  /** `bit(n)` when fixed, otherwise `varbit(n)`. */
  Bit(n: number, fixedLength = false): ColumnType {
    return new ColumnType(fixedLength ? 'bit' : 'varbit', [checkSize('Bit', n)])
  },
  BigSerial,
  Binary,
  FixedLengthString(n: number): ColumnType {
    return new ColumnType('char', [checkSize('FixedLengthString', n)])
  },
  Money,
  /** `inet` for host addresses, `cidr` for networks. */
  IPAddress(inet = false): ColumnType {
    return inet ? simple('inet') : simple('cidr')
  },
  MACAddress,
  Box,
  Line,
  LineSegment,
  Circle,
  Path,
  Point,
  Polygon,
  Double,
  Json,
  JsonB,
  PGLogSequenceNumber,
  Real,
  SmallInteger,
  SmallSerial,
  Serial,
  TextSearchQuery,
  TextSearchVector,
  TransactionID,
  XML,
  IntegerRange,
  NumericRange,
  DateRange,
} as const

/** An arbitrary type string, passed through to DDL unchecked. */
export function customType(sqlName: string): ColumnType {
  return new ColumnType(sqlName)
}
