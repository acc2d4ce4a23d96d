import { CursorError } from '@dbjob/validation'

/** Rows of one segment, either already read or still streaming from the cursor. */
export interface RowSequence<T> extends AsyncIterable<T> {
  readonly buffered: boolean
  toArray(): Promise<T[]>
}

export class BufferedRows<T> implements RowSequence<T> {
  readonly buffered = true

  constructor(readonly items: readonly T[]) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    yield* this.items
  }

  async toArray(): Promise<T[]> {
    return [...this.items]
  }
}

/**
 * Forward-only rows read on demand. Iterable once, and only while the run
 * context that owns the cursor is alive.
 */
export class LazyRows<T> implements RowSequence<T> {
  readonly buffered = false
  private consumed = false

  constructor(
    private readonly source: () => AsyncGenerator<T>,
    private readonly isAlive: () => boolean,
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) throw new CursorError('CURSOR_CONSUMED')
    this.consumed = true
    return this.iterate()
  }

  async toArray(): Promise<T[]> {
    const rows: T[] = []
    for await (const row of this) rows.push(row)
    return rows
  }

  private async *iterate(): AsyncGenerator<T> {
    const source = this.source()
    while (true) {
      if (!this.isAlive()) throw new CursorError('CURSOR_DISPOSED')
      const next = await source.next()
      if (next.done === true) return
      yield next.value
    }
  }
}
