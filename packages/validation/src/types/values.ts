/**
 * Field types a row mapper can coerce a column value into.
 * A trailing `?` on a field declaration (see `record()` in core) makes it nullable.
 */
export type FieldType = 'string' | 'number' | 'integer' | 'bigint' | 'boolean' | 'date' | 'binary' | 'json' | 'unknown'

/** Tagged value of a generic record column. */
export type DbValue =
  | { readonly type: 'null' }
  | { readonly type: 'integer'; readonly value: number }
  | { readonly type: 'bigint'; readonly value: bigint }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'binary'; readonly value: Uint8Array }
  | { readonly type: 'date'; readonly value: Date }
  | { readonly type: 'json'; readonly value: unknown }

/** One column of a result segment, as reported by the driver. */
export interface ColumnInfo {
  readonly name: string
  /** Driver-native type name (e.g. `int4`, `Nullable(String)`, `varchar`). */
  readonly type: string
  readonly ordinal: number
}
