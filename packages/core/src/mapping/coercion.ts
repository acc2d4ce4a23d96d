import type { DbValue, FieldType } from '@dbjob/validation'

export type Coerced = { readonly ok: true; readonly value: unknown } | { readonly ok: false }

const FAIL: Coerced = { ok: false }

function ok(value: unknown): Coerced {
  return { ok: true, value }
}

const INTEGER_TEXT = /^[+-]?\d+$/
const TRUE_TEXT = new Set(['true', 't', '1', 'yes', 'y'])
const FALSE_TEXT = new Set(['false', 'f', '0', 'no', 'n'])

/** Converts a non-null column value into the representation of `type`. */
export function coerceValue(value: unknown, type: FieldType): Coerced {
  switch (type) {
    case 'unknown':
      return ok(value)
    case 'string':
      return toText(value)
    case 'number':
      return toNumber(value)
    case 'integer':
      return toInteger(value)
    case 'bigint':
      return toBigInt(value)
    case 'boolean':
      return toBoolean(value)
    case 'date':
      return toDate(value)
    case 'binary':
      return value instanceof Uint8Array ? ok(value) : FAIL
    case 'json':
      return toJson(value)
  }
}

function toText(value: unknown): Coerced {
  if (typeof value === 'string') return ok(value)
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return ok(String(value))
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? FAIL : ok(value.toISOString())
  if (value instanceof Uint8Array) return FAIL
  if (typeof value === 'object' && value !== null) return ok(JSON.stringify(value))
  return FAIL
}

function toNumber(value: unknown): Coerced {
  if (typeof value === 'number') return ok(value)
  if (typeof value === 'bigint') return ok(Number(value))
  if (typeof value === 'boolean') return ok(value ? 1 : 0)
  if (typeof value === 'string') {
    const trimmed = value.trim()
    const n = Number(trimmed)
    return trimmed === '' || Number.isNaN(n) ? FAIL : ok(n)
  }
  return FAIL
}

function toInteger(value: unknown): Coerced {
  if (typeof value === 'number') return Number.isFinite(value) ? ok(Math.trunc(value)) : FAIL
  if (typeof value === 'bigint') {
    return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
      ? ok(Number(value))
      : FAIL
  }
  if (typeof value === 'boolean') return ok(value ? 1 : 0)
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (!INTEGER_TEXT.test(trimmed)) return FAIL
    const n = Number(trimmed)
    // beyond 2^53 the digits no longer survive; map to 'bigint' instead
    return Number.isSafeInteger(n) ? ok(n) : FAIL
  }
  return FAIL
}

function toBigInt(value: unknown): Coerced {
  if (typeof value === 'bigint') return ok(value)
  if (typeof value === 'number') return Number.isInteger(value) ? ok(BigInt(value)) : FAIL
  if (typeof value === 'boolean') return ok(value ? 1n : 0n)
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return INTEGER_TEXT.test(trimmed) ? ok(BigInt(trimmed)) : FAIL
  }
  return FAIL
}

function toBoolean(value: unknown): Coerced {
  if (typeof value === 'boolean') return ok(value)
  if (typeof value === 'number') return ok(value !== 0)
  if (typeof value === 'bigint') return ok(value !== 0n)
  if (typeof value === 'string') {
    const key = value.trim().toLowerCase()
    if (TRUE_TEXT.has(key)) return ok(true)
    if (FALSE_TEXT.has(key)) return ok(false)
  }
  return FAIL
}

function toDate(value: unknown): Coerced {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? FAIL : ok(value)
  if (typeof value === 'string') {
    const ms = Date.parse(value)
    return Number.isNaN(ms) ? FAIL : ok(new Date(ms))
  }
  if (typeof value === 'number' && Number.isFinite(value)) return ok(new Date(value))
  return FAIL
}

function toJson(value: unknown): Coerced {
  if (value instanceof Uint8Array) return FAIL
  if (typeof value !== 'string') return ok(value)
  try {
    return ok(JSON.parse(value))
  } catch {
    // plain text is a JSON string value
    return ok(value)
  }
}

// ── Descriptions & defaults ────────────────────────────────────

/** Runtime type name used in mapping errors. */
export function describeValue(value: unknown): string {
  if (value === null || value === undefined) return 'null'
  if (value instanceof Uint8Array) return 'binary'
  if (value instanceof Date) return 'date'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

export function zeroValue(type: FieldType): unknown {
  switch (type) {
    case 'string':
      return ''
    case 'number':
    case 'integer':
      return 0
    case 'bigint':
      return 0n
    case 'boolean':
      return false
    case 'date':
      return new Date(0)
    case 'binary':
      return new Uint8Array(0)
    case 'json':
    case 'unknown':
      return null
  }
}

export function toDbValue(value: unknown): DbValue {
  if (value === null || value === undefined) return { type: 'null' }
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? { type: 'integer', value } : { type: 'float', value }
    case 'bigint':
      return { type: 'bigint', value }
    case 'string':
      return { type: 'text', value }
    case 'boolean':
      return { type: 'boolean', value }
  }
  if (value instanceof Uint8Array) return { type: 'binary', value }
  if (value instanceof Date) return { type: 'date', value }
  return { type: 'json', value }
}
