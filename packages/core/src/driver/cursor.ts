import type { ColumnInfo, CommandBehavior } from '@dbjob/validation'

import type { RowCursor } from '../types/interfaces.js'

export interface BufferedSegment {
  readonly columns: readonly ColumnInfo[]
  readonly rows: readonly (readonly unknown[])[]
}

export interface BufferedCursorOptions {
  readonly recordsAffected?: number | undefined
  /** `singleResult` keeps segment 0 only, `singleRow` its first row, `schemaOnly` no rows. */
  readonly behavior?: CommandBehavior | undefined
  readonly onDispose?: (() => Promise<void>) | undefined
}

/** Column list for drivers that report names (and optionally type names) only. */
export function columnsOf(names: readonly string[], types: readonly string[] = []): ColumnInfo[] {
  return names.map((name, ordinal) => ({ name, type: types[ordinal] ?? 'unknown', ordinal }))
}

/** Row cursor over segments a driver has already fetched in full. */
export function bufferedCursor(segments: readonly BufferedSegment[], options: BufferedCursorOptions = {}): RowCursor {
  const behavior = options.behavior ?? {}
  let visible = behavior.singleResult === true || behavior.singleRow === true ? segments.slice(0, 1) : segments
  if (behavior.schemaOnly === true) {
    visible = visible.map((s) => ({ columns: s.columns, rows: [] }))
  } else if (behavior.singleRow === true) {
    visible = visible.map((s) => ({ columns: s.columns, rows: s.rows.slice(0, 1) }))
  }

  let segment = 0
  let row = -1
  let disposed = false

  return {
    columnSchema: () => visible[segment]?.columns ?? [],
    advanceRow: async () => {
      const current = visible[segment]
      if (current === undefined || row + 1 >= current.rows.length) return false
      row++
      return true
    },
    advanceSegment: async () => {
      if (segment + 1 >= visible.length) {
        segment = visible.length
        return false
      }
      segment++
      row = -1
      return true
    },
    readColumn: (index) => visible[segment]?.rows[row]?.[index] ?? null,
    recordsAffected: options.recordsAffected ?? -1,
    dispose: async () => {
      if (disposed) return
      disposed = true
      await options.onDispose?.()
    },
  }
}
