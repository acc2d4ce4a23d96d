import type { ColumnInfo, CommandBehavior, RowCursor } from '@dbjob/core'
import type { QueryResult } from 'trino-client'

export interface PagedCursorOptions {
  readonly behavior: CommandBehavior
  /** Sees every page before its rows; throws to fail the read. */
  readonly onPage: (page: QueryResult) => void
  /** Maps a failed page fetch to the error the read fails with. */
  readonly onError: (err: unknown) => Error
  readonly onDispose: (finished: boolean) => Promise<void>
}

/**
 * Row cursor over Trino's result pages. Pages are fetched as rows are read,
 * so an unread query keeps running on the server until the cursor is disposed.
 */
export class PagedCursor implements RowCursor {
  readonly recordsAffected = -1

  private columns: ColumnInfo[] = []
  private page: readonly unknown[][] = []
  private index = -1
  private emitted = 0
  private done = false
  private exhausted = false
  private disposed = false

  constructor(
    private readonly pages: AsyncIterator<QueryResult>,
    private readonly options: PagedCursorOptions,
  ) {}

  get finished(): boolean {
    return this.done
  }

  /** Fetches pages until the column list is known. */
  async open(): Promise<void> {
    while (this.columns.length === 0 && !this.done) await this.fetch()
  }

  /** Fetches every remaining page, discarding rows. */
  async drain(): Promise<void> {
    while (!this.done) await this.fetch()
  }

  columnSchema(): readonly ColumnInfo[] {
    return this.exhausted ? [] : this.columns
  }

  async advanceRow(): Promise<boolean> {
    const { singleRow, schemaOnly } = this.options.behavior
    if (this.exhausted || schemaOnly === true) return false
    if (singleRow === true && this.emitted >= 1) return false
    while (this.index + 1 >= this.page.length) {
      if (this.done) return false
      await this.fetch()
    }
    this.index++
    this.emitted++
    return true
  }

  async advanceSegment(): Promise<boolean> {
    this.exhausted = true
    return false
  }

  readColumn(index: number): unknown {
    return this.page[this.index]?.[index] ?? null
  }

  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true
    await this.options.onDispose(this.done)
  }

  private async fetch(): Promise<void> {
    let next: IteratorResult<QueryResult>
    try {
      next = await this.pages.next()
    } catch (err) {
      throw this.options.onError(err)
    }
    this.page = []
    this.index = -1
    if (next.done === true) {
      this.done = true
      return
    }

    const result = next.value
    try {
      this.options.onPage(result)
    } catch (err) {
      // A failed page ends the query on the server
      this.done = true
      throw err
    }
    if (result.columns !== undefined && this.columns.length === 0) {
      this.columns = result.columns.map((c, ordinal) => ({ name: c.name, type: c.type, ordinal }))
    }
    this.page = result.data ?? []
  }
}
