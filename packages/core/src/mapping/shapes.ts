import type {
  ColumnInfo,
  ColumnMapSettings,
  DbValue,
  FieldType,
  GenericRecord,
  KeyValuePairs,
} from '@dbjob/validation'
import { MappingError } from '@dbjob/validation'

import { coerceValue, describeValue, toDbValue, zeroValue } from './coercion.js'
import type { MappingPlan } from './plan.js'
import { PlanCache } from './plan.js'

// ── Field specs ────────────────────────────────────────────────

/** A field type, optionally suffixed with `?` to make the field nullable. */
export type FieldSpec = FieldType | `${FieldType}?`

export type FieldTypeValue<F> = F extends 'string'
  ? string
  : F extends 'number' | 'integer'
    ? number
    : F extends 'bigint'
      ? bigint
      : F extends 'boolean'
        ? boolean
        : F extends 'date'
          ? Date
          : F extends 'binary'
            ? Uint8Array
            : unknown

export type FieldValue<S> = S extends `${infer B extends FieldType}?`
  ? FieldTypeValue<B> | null
  : S extends FieldType
    ? FieldTypeValue<S>
    : never

export type RecordOf<F> = { -readonly [K in keyof F]: FieldValue<F[K]> }

export interface FieldDescriptor {
  readonly name: string
  readonly type: FieldType
  readonly nullable: boolean
}

const FIELD_TYPES = new Set<string>(['string', 'number', 'integer', 'bigint', 'boolean', 'date', 'binary', 'json', 'unknown'])

function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.has(value)
}

export function parseFieldSpec(spec: string): { type: FieldType; nullable: boolean } {
  const nullable = spec.endsWith('?')
  const type = nullable ? spec.slice(0, -1) : spec
  if (!isFieldType(type)) {
    throw new MappingError({ code: 'UNSUPPORTED_SHAPE', shape: `field type '${spec}'` })
  }
  return { type, nullable }
}

// ── Shapes ─────────────────────────────────────────────────────

/**
 * What one row becomes. A shape owns the plans built for it, so reusing the
 * same shape object across runs reuses its plans.
 */
export interface RowShape<T> {
  readonly kind: 'scalar' | 'record' | 'dictionary' | 'pairs'
  readonly name: string
  plan(columns: readonly ColumnInfo[], settings?: ColumnMapSettings): MappingPlan<T>
}

/** Target a record shape maps into: fields to fill, a factory and a setter. */
export interface Mappable<T> {
  fields(): readonly FieldDescriptor[]
  create(): T
  setField(target: T, name: string, value: unknown): void
}

function createShape<T>(
  kind: RowShape<T>['kind'],
  name: string,
  build: (columns: readonly ColumnInfo[], settings: ColumnMapSettings | undefined) => MappingPlan<T>,
): RowShape<T> {
  const cache = new PlanCache<T>()
  return {
    kind,
    name,
    plan: (columns, settings) => cache.get(columns, settings, () => build(columns, settings)),
  }
}

/** First column of each row, coerced to `spec`. */
export function scalar<S extends FieldSpec>(spec: S): RowShape<FieldValue<S>> {
  const { type, nullable } = parseFieldSpec(spec)
  return createShape<FieldValue<S>>('scalar', `scalar(${spec})`, (columns, settings) => {
    const column = columns[0]
    if (column === undefined) {
      throw new MappingError({ code: 'UNSUPPORTED_SHAPE', shape: `scalar(${spec}) over a segment without columns` })
    }
    const convert = settings?.converters?.[column.name]
    return {
      columns,
      map(read) {
        const raw = read(0)
        const value = convert !== undefined ? convert(raw) : raw
        // the parsed spec fixes the runtime type of the coerced value
        return readScalar(value, type, nullable, column.name) as FieldValue<S>
      },
    }
  })
}

function readScalar(value: unknown, type: FieldType, nullable: boolean, column: string): unknown {
  if (value === null || value === undefined) return nullable ? null : zeroValue(type)
  const coerced = coerceValue(value, type)
  if (!coerced.ok) {
    throw new MappingError({
      code: 'COLUMN_TYPE_MISMATCH',
      column,
      field: '(scalar)',
      expected: type,
      actual: describeValue(value),
    })
  }
  return coerced.value
}

/**
 * Plain-object rows with declared field types.
 *
 * ```ts
 * const User = record({ id: 'integer', name: 'string', email: 'string?' })
 * ```
 *
 * Non-nullable fields with no matching column keep a zero value
 * (`0`, `''`, `false`, `0n`, epoch date, empty bytes); nullable ones keep `null`.
 */
export function record<F extends Record<string, FieldSpec>>(fields: F, name = 'record'): RowShape<RecordOf<F>> {
  const descriptors: FieldDescriptor[] = Object.entries(fields).map(([field, spec]) => ({
    name: field,
    ...parseFieldSpec(spec),
  }))
  return custom<RecordOf<F>>(
    {
      fields: () => descriptors,
      create: () => {
        const target: Partial<RecordOf<F>> = {}
        for (const field of descriptors) {
          Reflect.set(target, field.name, field.nullable ? null : zeroValue(field.type))
        }
        return target as RecordOf<F>
      },
      setField: (target, field, value) => {
        Reflect.set(target, field, value)
      },
    },
    name,
  )
}

/** Class instances: `new Ctor()` then one property per declared field. */
export function fromClass<T extends object>(
  ctor: new () => T,
  fields: Readonly<Record<string, FieldSpec>>,
): RowShape<T> {
  const descriptors: FieldDescriptor[] = Object.entries(fields).map(([field, spec]) => ({
    name: field,
    ...parseFieldSpec(spec),
  }))
  return custom<T>(
    {
      fields: () => descriptors,
      create: () => new ctor(),
      setField: (target, field, value) => {
        Reflect.set(target, field, value)
      },
    },
    ctor.name,
  )
}

export function custom<T>(mappable: Mappable<T>, name = 'custom'): RowShape<T> {
  return createShape<T>('record', name, (columns, settings) => mappablePlan(mappable, columns, settings))
}

// ── Record plans ───────────────────────────────────────────────

interface FieldBinding {
  readonly index: number
  readonly column: string
  readonly field: FieldDescriptor
  readonly convert: ((value: unknown) => unknown) | undefined
}

function lower(name: string): string {
  return name.toLowerCase()
}

function overrides(settings: ColumnMapSettings | undefined): {
  ignored: Set<string>
  aliases: Map<string, string>
  converters: Map<string, (value: unknown) => unknown>
} {
  const aliases = new Map<string, string>()
  for (const [column, field] of Object.entries(settings?.aliases ?? {})) {
    aliases.set(lower(column), field)
  }
  const converters = new Map<string, (value: unknown) => unknown>()
  for (const [field, convert] of Object.entries(settings?.converters ?? {})) {
    converters.set(lower(field), convert)
  }
  return { ignored: new Set((settings?.ignore ?? []).map(lower)), aliases, converters }
}

/**
 * Aliases bind first; remaining columns match fields by case-insensitive
 * name. When two columns reach the same field, the earlier column wins.
 */
function bindFields(
  columns: readonly ColumnInfo[],
  fields: readonly FieldDescriptor[],
  settings: ColumnMapSettings | undefined,
): FieldBinding[] {
  const byKey = new Map(fields.map((f): [string, FieldDescriptor] => [lower(f.name), f]))
  const { ignored, aliases, converters } = overrides(settings)
  const bound = new Set<string>()
  const bindings: FieldBinding[] = []

  const bind = (index: number, column: ColumnInfo, field: FieldDescriptor | undefined): void => {
    if (field === undefined || bound.has(field.name)) return
    bound.add(field.name)
    bindings.push({ index, column: column.name, field, convert: converters.get(lower(field.name)) })
  }

  for (const [index, column] of columns.entries()) {
    const key = lower(column.name)
    const alias = aliases.get(key)
    if (ignored.has(key) || alias === undefined) continue
    bind(index, column, byKey.get(lower(alias)))
  }
  for (const [index, column] of columns.entries()) {
    const key = lower(column.name)
    if (ignored.has(key) || aliases.has(key)) continue
    bind(index, column, byKey.get(key))
  }

  return bindings
}

function mappablePlan<T>(
  mappable: Mappable<T>,
  columns: readonly ColumnInfo[],
  settings: ColumnMapSettings | undefined,
): MappingPlan<T> {
  const bindings = bindFields(columns, mappable.fields(), settings)
  return {
    columns,
    map(read) {
      const target = mappable.create()
      for (const binding of bindings) {
        const raw = read(binding.index)
        const value = binding.convert !== undefined ? binding.convert(raw) : raw
        const { field } = binding
        if (value === null || value === undefined) {
          if (field.nullable) mappable.setField(target, field.name, null)
          continue
        }
        const coerced = coerceValue(value, field.type)
        if (!coerced.ok) {
          throw new MappingError({
            code: 'COLUMN_TYPE_MISMATCH',
            column: binding.column,
            field: field.name,
            expected: field.type,
            actual: describeValue(value),
          })
        }
        mappable.setField(target, field.name, coerced.value)
      }
      return target
    },
  }
}

// ── Generic records ────────────────────────────────────────────

interface GenericColumn {
  readonly index: number
  readonly key: string
  readonly convert: ((value: unknown) => unknown) | undefined
}

function genericColumns(columns: readonly ColumnInfo[], settings: ColumnMapSettings | undefined): GenericColumn[] {
  const { ignored, aliases, converters } = overrides(settings)
  const out: GenericColumn[] = []
  for (const [index, column] of columns.entries()) {
    const key = lower(column.name)
    if (ignored.has(key)) continue
    const name = aliases.get(key) ?? column.name
    out.push({ index, key: name, convert: converters.get(lower(name)) })
  }
  return out
}

function readGeneric(read: (index: number) => unknown, column: GenericColumn): DbValue {
  const raw = read(column.index)
  return toDbValue(column.convert !== undefined ? column.convert(raw) : raw)
}

const DICTIONARY = createShape<GenericRecord>('dictionary', 'dictionary', (columns, settings) => {
  const generic = genericColumns(columns, settings)
  return {
    columns,
    map(read) {
      const row = new Map<string, DbValue>()
      for (const column of generic) {
        if (!row.has(column.key)) row.set(column.key, readGeneric(read, column))
      }
      return row
    },
  }
})

const PAIRS = createShape<KeyValuePairs>('pairs', 'keyValuePairs', (columns, settings) => {
  const generic = genericColumns(columns, settings)
  return {
    columns,
    map: (read) => generic.map((column): readonly [string, DbValue] => [column.key, readGeneric(read, column)]),
  }
})

/** Column name → tagged value. With duplicate column names the first one wins. */
export function dictionary(): RowShape<GenericRecord> {
  return DICTIONARY
}

/** Ordered `[name, value]` pairs. Duplicate column names are all kept. */
export function keyValuePairs(): RowShape<KeyValuePairs> {
  return PAIRS
}
