export type StatementKind = 'select' | 'insert' | 'update' | 'delete'

/**
 * One generated SQL operation: the text and its positional arguments,
 * index-aligned with the `$n` placeholders in the text.
 */
export class Statement {
  readonly kind: StatementKind
  readonly table: string
  readonly text: string
  readonly args: readonly unknown[]

  constructor(kind: StatementKind, table: string, text: string, args: readonly unknown[] = []) {
    this.kind = kind
    this.table = table
    this.text = text
    this.args = Object.freeze([...args])
    Object.freeze(this)
  }

  /** SQL text followed by the arguments, ready to spread into a driver call. */
  query(): [string, ...unknown[]] {
    return [this.text, ...this.args]
  }

  toString(): string {
    return this.text
  }
}

/**
 * Hands out `$1`, `$2`, ... in order. A statement uses exactly one counter,
 * so no index is reused or skipped.
 */
export class PlaceholderCounter {
  private current = 0

  next(): string {
    this.current++
    return `$${this.current}`
  }

  /** Placeholders handed out so far. */
  get count(): number {
    return this.current
  }
}
