import type { ColumnMapSettings, DataSet, DataTable, GenericRecord } from '@dbjob/validation'
import { CardinalityError } from '@dbjob/validation'

import type { MappingPlan } from '../mapping/plan.js'
import type { RowShape } from '../mapping/shapes.js'
import { dictionary } from '../mapping/shapes.js'
import type { RowCursor } from '../types/interfaces.js'
import { LazyRows } from './rows.js'

// ── Slots ──────────────────────────────────────────────────────

/** One result slot of a multi-segment read. */
export type SlotSpec<T> = RowShape<T> | { readonly shape: RowShape<T>; readonly required?: boolean | undefined }

type Slot = SlotSpec<unknown>

/** One to eight slots. */
export type SlotTuple =
  | readonly [Slot]
  | readonly [Slot, Slot]
  | readonly [Slot, Slot, Slot]
  | readonly [Slot, Slot, Slot, Slot]
  | readonly [Slot, Slot, Slot, Slot, Slot]
  | readonly [Slot, Slot, Slot, Slot, Slot, Slot]
  | readonly [Slot, Slot, Slot, Slot, Slot, Slot, Slot]
  | readonly [Slot, Slot, Slot, Slot, Slot, Slot, Slot, Slot]

export type SlotRows<S> = S extends SlotSpec<infer T> ? T[] : never

export type SlotResults<S extends readonly Slot[]> = { -readonly [K in keyof S]: SlotRows<S[K]> }

function slotShape(slot: Slot): RowShape<unknown> {
  return 'plan' in slot ? slot : slot.shape
}

function slotRequired(slot: Slot): boolean {
  return !('plan' in slot) && slot.required === true
}

// ── Materializer ───────────────────────────────────────────────

export type CursorState = 'beforeFirstSegment' | 'inSegment' | 'afterSegment' | 'exhausted'

export interface MaterializerOptions {
  readonly signal?: AbortSignal | undefined
  readonly mapSettings?: ColumnMapSettings | undefined
  /** Lazy rows stop with `CURSOR_DISPOSED` once this turns false. */
  readonly isAlive?: (() => boolean) | undefined
}

type ReadOne<T> = { readonly found: false } | { readonly found: true; readonly row: T }

/**
 * Drives a row cursor into the requested result form.
 *
 * Cancellation is checked before every row and segment step. Once observed,
 * reading stops and whatever was complete is returned; no error is thrown here.
 */
export class ResultMaterializer {
  private cursorState: CursorState = 'beforeFirstSegment'
  private segment = 0
  private stopped = false
  private readonly read = (index: number): unknown => this.cursor.readColumn(index)

  constructor(
    private readonly cursor: RowCursor,
    private readonly options: MaterializerOptions = {},
  ) {}

  get canceled(): boolean {
    return this.stopped
  }

  get state(): CursorState {
    return this.cursorState
  }

  get segmentIndex(): number {
    return this.segment
  }

  // --- Single segment ---

  /** First row, or `undefined` when canceled before it was read. */
  async first<T>(shape: RowShape<T>): Promise<T | undefined> {
    const result = await this.readOne(shape, false)
    if (result.found) return result.row
    if (this.stopped) return undefined
    throw new CardinalityError('EMPTY_RESULT', this.segment)
  }

  async firstOrDefault<T>(shape: RowShape<T>): Promise<T | null> {
    const result = await this.readOne(shape, false)
    return result.found ? result.row : null
  }

  /** The only row, or `undefined` when canceled before it was read. */
  async single<T>(shape: RowShape<T>): Promise<T | undefined> {
    const result = await this.readOne(shape, true)
    if (result.found) return result.row
    if (this.stopped) return undefined
    throw new CardinalityError('EMPTY_RESULT', this.segment)
  }

  async singleOrDefault<T>(shape: RowShape<T>): Promise<T | null> {
    const result = await this.readOne(shape, true)
    return result.found ? result.row : null
  }

  async list<T>(shape: RowShape<T>): Promise<T[]> {
    return this.readRows(shape)
  }

  lazy<T>(shape: RowShape<T>): LazyRows<T> {
    return new LazyRows(() => this.stream(shape), this.options.isAlive ?? (() => true))
  }

  /** Current segment as columns × raw values. Duplicate column names are kept. */
  async table(): Promise<DataTable> {
    const columns = this.cursor.columnSchema()
    const rows: unknown[][] = []
    while (await this.nextRow()) {
      rows.push(columns.map((_, index) => this.read(index)))
    }
    return { columns, rows }
  }

  recordsAffected(): number {
    return this.cursor.recordsAffected
  }

  // --- All segments ---

  /**
   * Segment k fills slot k, buffered. Missing or empty segments leave the
   * slot empty unless it is marked `required`. Extra segments are skipped.
   */
  async multiple<S extends SlotTuple>(slots: S): Promise<SlotResults<S>> {
    const specs: readonly Slot[] = slots
    const results: unknown[][] = specs.map(() => [])
    let produced = 0

    for (const [index, slot] of specs.entries()) {
      if (index > 0 && !(await this.nextSegment())) break
      const rows = await this.readRows(slotShape(slot))
      if (this.stopped) break
      results[index] = rows
      if (index > 0 || rows.length > 0 || this.cursor.columnSchema().length > 0) produced = index + 1
    }

    if (!this.stopped) {
      for (const [index, slot] of specs.entries()) {
        if (index >= produced && slotRequired(slot)) {
          throw new CardinalityError('MISSING_RESULT_SEGMENT', index)
        }
      }
    }
    // slot k holds rows of slot k's shape
    return results as unknown as SlotResults<S>
  }

  async dataSet(): Promise<DataSet> {
    const tables: DataTable[] = []
    do {
      const table = await this.table()
      if (table.columns.length > 0 || table.rows.length > 0) tables.push(table)
    } while (await this.nextSegment())
    return { tables }
  }

  async collectionSet(shape: RowShape<GenericRecord> = dictionary()): Promise<GenericRecord[][]> {
    const sets: GenericRecord[][] = []
    do {
      const rows = await this.readRows(shape)
      if (rows.length > 0 || this.cursor.columnSchema().length > 0) sets.push(rows)
    } while (await this.nextSegment())
    return sets
  }

  // --- Cursor steps ---

  private observeCancel(): boolean {
    if (this.options.signal?.aborted === true) this.stopped = true
    return this.stopped
  }

  private async nextRow(): Promise<boolean> {
    if (this.cursorState === 'afterSegment' || this.cursorState === 'exhausted') return false
    if (this.observeCancel()) return false
    this.cursorState = 'inSegment'
    const hasRow = await this.cursor.advanceRow()
    if (!hasRow) this.cursorState = 'afterSegment'
    return hasRow
  }

  private async nextSegment(): Promise<boolean> {
    if (this.cursorState === 'exhausted') return false
    if (this.observeCancel()) return false
    const hasSegment = await this.cursor.advanceSegment()
    if (hasSegment) {
      this.segment++
      this.cursorState = 'inSegment'
    } else {
      this.cursorState = 'exhausted'
    }
    return hasSegment
  }

  private planFor<T>(shape: RowShape<T>): MappingPlan<T> {
    return shape.plan(this.cursor.columnSchema(), this.options.mapSettings)
  }

  private async readOne<T>(shape: RowShape<T>, single: boolean): Promise<ReadOne<T>> {
    if (!(await this.nextRow())) return { found: false }
    const row = this.planFor(shape).map(this.read)
    if (single && (await this.nextRow())) {
      throw new CardinalityError('MULTIPLE_ROWS_FOUND', this.segment)
    }
    return { found: true, row }
  }

  private async readRows<T>(shape: RowShape<T>): Promise<T[]> {
    const rows: T[] = []
    let plan: MappingPlan<T> | undefined
    while (await this.nextRow()) {
      if (plan === undefined) plan = this.planFor(shape)
      rows.push(plan.map(this.read))
    }
    return rows
  }

  private async *stream<T>(shape: RowShape<T>): AsyncGenerator<T> {
    let plan: MappingPlan<T> | undefined
    while (await this.nextRow()) {
      if (plan === undefined) plan = this.planFor(shape)
      yield plan.map(this.read)
    }
  }
}
