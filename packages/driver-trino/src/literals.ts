import type { ParameterDescriptor, ParameterTypeHint, PrepareCommandRequest } from '@dbjob/core'
import { rewriteNamedParameters } from '@dbjob/core'

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

/**
 * Inline a parameter value into Trino SQL.
 * Strings are escaped by doubling single-quotes (Trino's default SQL mode
 * does not use C-style backslash escapes).
 */
export function escapeTrinoValue(value: unknown, hint?: ParameterTypeHint): string {
  if (value === null || value === undefined) return 'NULL'
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new Error(`Unsupported Trino number: ${String(value)}`)
    return String(value)
  }
  if (typeof value === 'bigint') return value.toString()
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE'
  if (typeof value === 'string') return hint === 'json' ? `JSON ${quote(value)}` : quote(value)
  if (value instanceof Date) return `TIMESTAMP '${value.toISOString().replace('T', ' ').replace('Z', '')}'`
  if (value instanceof Uint8Array) return `X'${Buffer.from(value).toString('hex')}'`
  if (Array.isArray(value)) {
    return `ARRAY[${value.map((v) => escapeTrinoValue(v)).join(', ')}]`
  }
  if (typeof value === 'object' && hint === 'json') return `JSON ${quote(JSON.stringify(value))}`
  throw new Error(`Unsupported Trino parameter type: ${typeof value}`)
}

/** Statement text with every bound `@name` replaced by its literal. */
export function compileStatement(
  request: Pick<PrepareCommandRequest, 'text' | 'type'>,
  parameters: readonly ParameterDescriptor[],
): string {
  const inputs = parameters.filter((p) => p.direction === 'input' || p.direction === 'inputOutput')

  switch (request.type) {
    case 'tableDirect':
      return `SELECT * FROM ${request.text}`
    case 'storedProcedure':
      return `CALL ${request.text}(${inputs.map((p) => escapeTrinoValue(p.value, p.typeHint)).join(', ')})`
    case 'text': {
      const byName = new Map(inputs.map((p) => [p.name.toLowerCase(), p]))
      return rewriteNamedParameters(request.text, '@', (name) => {
        const descriptor = byName.get(name.toLowerCase())
        return descriptor === undefined ? undefined : escapeTrinoValue(descriptor.value, descriptor.typeHint)
      })
    }
  }
}
