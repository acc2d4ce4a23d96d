import type { BindingRestrictions } from './parameters.js'

export type CommandType = 'text' | 'storedProcedure' | 'tableDirect'

export interface CommandBehavior {
  readonly singleResult?: boolean | undefined
  readonly singleRow?: boolean | undefined
  readonly keyInfo?: boolean | undefined
  readonly schemaOnly?: boolean | undefined
}

export interface ColumnMapSettings {
  /** Column name → field name. Takes precedence over name matching. */
  readonly aliases?: Readonly<Record<string, string>> | undefined
  /** Field name → converter applied to the raw column value before coercion. */
  readonly converters?: Readonly<Record<string, (value: unknown) => unknown>> | undefined
  /** Columns never mapped. */
  readonly ignore?: readonly string[] | undefined
}

export interface CommandSpec {
  readonly text: string
  readonly type?: CommandType | undefined
  readonly parameters?: unknown
  readonly restrictions?: BindingRestrictions | undefined
  readonly timeoutMs?: number | undefined
  readonly behavior?: CommandBehavior | undefined
  readonly mapSettings?: ColumnMapSettings | undefined
}

/** Mutable view handed to an initializer callback. */
export interface CommandDraft {
  text: string
  type: CommandType
  parameters: unknown
  restrictions: BindingRestrictions | undefined
  timeoutMs: number | undefined
  behavior: CommandBehavior | undefined
  mapSettings: ColumnMapSettings | undefined
}

export type CommandSource = string | CommandSpec | ((draft: CommandDraft) => void)
