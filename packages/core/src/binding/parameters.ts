import type {
  BindingRestrictions,
  ParameterDescriptor,
  ParameterDirection,
  ParameterTypeHint,
} from '@dbjob/validation'
import { ParameterBindingError } from '@dbjob/validation'

// ── Type hints ─────────────────────────────────────────────────

export function inferTypeHint(value: unknown): ParameterTypeHint {
  if (value === null || value === undefined) return 'null'
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float'
    case 'bigint':
      return 'bigint'
    case 'string':
      return 'text'
    case 'boolean':
      return 'boolean'
  }
  if (value instanceof Uint8Array) return 'binary'
  if (value instanceof Date) return 'date'
  if (Array.isArray(value)) return 'array'
  return 'json'
}

// ── Binder ─────────────────────────────────────────────────────

/**
 * Turns a parameter source into named input descriptors.
 *
 * - `null` / `undefined` → no parameters
 * - a flat value (string, number, bigint, boolean, Date, bytes) → one parameter
 *   named `restrictions.name` (default `value`)
 * - a `Map` with string keys or a plain object → one parameter per entry,
 *   in insertion order
 * - a `ParameterCollection` → its descriptors as-is
 *
 * Arrays, sets and other bare collections cannot be decomposed into names and
 * throw `ParameterBindingError` (`UNSUPPORTED_PARAMETER_SHAPE`). Arrays as
 * field values are fine.
 */
export function bindParameters(source: unknown, restrictions: BindingRestrictions = {}): ParameterDescriptor[] {
  if (source === null || source === undefined) return []
  if (source instanceof ParameterCollection) return source.toDescriptors()

  const caseSensitive = restrictions.caseSensitive === true
  const normalize = (name: string): string => (caseSensitive ? name : name.toLowerCase())
  const include = restrictions.include !== undefined ? new Set(restrictions.include.map(normalize)) : undefined
  const exclude = new Set((restrictions.exclude ?? []).map(normalize))
  const prefix = restrictions.prefix ?? ''
  const suffix = restrictions.suffix ?? ''

  const seen = new Set<string>()
  const descriptors: ParameterDescriptor[] = []

  for (const [field, value] of decompose(source, restrictions.name ?? 'value')) {
    const fieldKey = normalize(field)
    if (include !== undefined && !include.has(fieldKey)) continue
    if (exclude.has(fieldKey)) continue
    if (restrictions.excludeNulls === true && (value === null || value === undefined)) continue

    const name = `${prefix}${field}${suffix}`
    const nameKey = normalize(name)
    if (seen.has(nameKey)) {
      throw new ParameterBindingError({ code: 'DUPLICATE_PARAMETER_NAME', name })
    }
    seen.add(nameKey)
    descriptors.push({ name, direction: 'input', typeHint: inferTypeHint(value), value: value ?? null })
  }

  return descriptors
}

/** Concatenates descriptor lists, rejecting names that collide. */
export function mergeParameters(
  sets: readonly (readonly ParameterDescriptor[])[],
  caseSensitive = false,
): ParameterDescriptor[] {
  const seen = new Set<string>()
  const merged: ParameterDescriptor[] = []
  for (const set of sets) {
    for (const descriptor of set) {
      const key = caseSensitive ? descriptor.name : descriptor.name.toLowerCase()
      if (seen.has(key)) {
        throw new ParameterBindingError({ code: 'DUPLICATE_PARAMETER_NAME', name: descriptor.name })
      }
      seen.add(key)
      merged.push(descriptor)
    }
  }
  return merged
}

function decompose(source: unknown, scalarName: string): Array<[string, unknown]> {
  if (isFlatValue(source)) return [[scalarName, source]]

  if (source instanceof Map) {
    const entries: Array<[string, unknown]> = []
    for (const [key, value] of source) {
      if (typeof key !== 'string') {
        throw new ParameterBindingError({ code: 'UNSUPPORTED_PARAMETER_SHAPE', shape: `Map<${typeof key}>` })
      }
      entries.push([key, value])
    }
    return entries
  }

  if (typeof source === 'object' && source !== null) {
    if (Array.isArray(source) || ArrayBuffer.isView(source) || source instanceof Set || Symbol.iterator in source) {
      throw new ParameterBindingError({ code: 'UNSUPPORTED_PARAMETER_SHAPE', shape: source.constructor.name })
    }
    const entries: Array<[string, unknown]> = Object.entries(source)
    return entries.filter(([, value]) => typeof value !== 'function')
  }

  throw new ParameterBindingError({ code: 'UNSUPPORTED_PARAMETER_SHAPE', shape: typeof source })
}

function isFlatValue(value: unknown): boolean {
  const t = typeof value
  return (
    t === 'string' ||
    t === 'number' ||
    t === 'bigint' ||
    t === 'boolean' ||
    value instanceof Date ||
    value instanceof Uint8Array
  )
}

// ── ParameterCollection ────────────────────────────────────────

export interface AddParameterOptions {
  readonly direction?: ParameterDirection | undefined
  readonly typeHint?: ParameterTypeHint | undefined
  readonly size?: number | undefined
}

/**
 * Explicit parameter list. Pass it as a command's `parameters` to bind output
 * and return-value parameters; their values are written back after the run
 * and read with `value(name)`.
 */
export class ParameterCollection implements Iterable<ParameterDescriptor> {
  private readonly entries = new Map<string, ParameterDescriptor>()

  constructor(private readonly caseSensitive = false) {}

  add(name: string, value: unknown, options: AddParameterOptions = {}): this {
    this.put({
      name,
      direction: options.direction ?? 'input',
      typeHint: options.typeHint ?? inferTypeHint(value),
      size: options.size,
      value: value ?? null,
    })
    return this
  }

  addOutput(name: string, typeHint?: ParameterTypeHint, size?: number): this {
    this.put({ name, direction: 'output', typeHint, size, value: null })
    return this
  }

  addReturnValue(name = 'returnValue', typeHint: ParameterTypeHint = 'integer'): this {
    this.put({ name, direction: 'returnValue', typeHint, value: null })
    return this
  }

  /** Adds every parameter `bindParameters(source, restrictions)` produces. */
  addFor(source: unknown, restrictions: BindingRestrictions = {}): this {
    for (const descriptor of bindParameters(source, { caseSensitive: this.caseSensitive, ...restrictions })) {
      this.put(descriptor)
    }
    return this
  }

  get(name: string): ParameterDescriptor | undefined {
    return this.entries.get(this.key(name))
  }

  has(name: string): boolean {
    return this.entries.has(this.key(name))
  }

  value(name: string): unknown {
    return this.get(name)?.value
  }

  get size(): number {
    return this.entries.size
  }

  /** Writes driver-reported values into the non-input parameters they name. */
  applyOutputs(values: ReadonlyMap<string, unknown>): void {
    for (const [name, value] of values) {
      const key = this.key(name)
      const descriptor = this.entries.get(key)
      if (descriptor !== undefined && descriptor.direction !== 'input') {
        this.entries.set(key, { ...descriptor, value })
      }
    }
  }

  toDescriptors(): ParameterDescriptor[] {
    return [...this.entries.values()]
  }

  [Symbol.iterator](): Iterator<ParameterDescriptor> {
    return this.entries.values()
  }

  private put(descriptor: ParameterDescriptor): void {
    const key = this.key(descriptor.name)
    if (this.entries.has(key)) {
      throw new ParameterBindingError({ code: 'DUPLICATE_PARAMETER_NAME', name: descriptor.name })
    }
    this.entries.set(key, descriptor)
  }

  private key(name: string): string {
    return this.caseSensitive ? name : name.toLowerCase()
  }
}
