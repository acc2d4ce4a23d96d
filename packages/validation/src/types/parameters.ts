export type ParameterDirection = 'input' | 'output' | 'inputOutput' | 'returnValue'

export type ParameterTypeHint =
  | 'integer'
  | 'float'
  | 'bigint'
  | 'text'
  | 'boolean'
  | 'binary'
  | 'date'
  | 'json'
  | 'array'
  | 'null'

export interface ParameterDescriptor {
  readonly name: string
  readonly direction: ParameterDirection
  readonly typeHint?: ParameterTypeHint | undefined
  readonly size?: number | undefined
  readonly value: unknown
}

export interface BindingRestrictions {
  /** Field names never bound. */
  readonly exclude?: readonly string[] | undefined
  /** When set, only these field names are bound. */
  readonly include?: readonly string[] | undefined
  readonly prefix?: string | undefined
  readonly suffix?: string | undefined
  /** Skip fields whose value is `null` or `undefined`. */
  readonly excludeNulls?: boolean | undefined
  /** Name comparison for include/exclude and duplicate detection. Default: case-insensitive. */
  readonly caseSensitive?: boolean | undefined
  /** Name given to a flat scalar source. Default: `value`. */
  readonly name?: string | undefined
}
