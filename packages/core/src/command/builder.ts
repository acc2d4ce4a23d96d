import type { CommandBehavior, CommandDraft, CommandSource, CommandSpec, ParameterDescriptor } from '@dbjob/validation'
import { validateCommandSpec } from '@dbjob/validation'

import { inferTypeHint } from '../binding/parameters.js'
import type { DriverCapabilities, DriverCommand, DriverConnection, DriverTransaction } from '../types/interfaces.js'

// ── Command sources ────────────────────────────────────────────

/** Normalizes a command source. Initializer callbacks run against a fresh draft. */
export function resolveCommandSpec(source: CommandSource): CommandSpec {
  if (typeof source === 'string') return { text: source }
  if (typeof source === 'function') {
    const draft: CommandDraft = {
      text: '',
      type: 'text',
      parameters: undefined,
      restrictions: undefined,
      timeoutMs: undefined,
      behavior: undefined,
      mapSettings: undefined,
    }
    source(draft)
    return { ...draft }
  }
  return source
}

/** Explicit command timeout, then the job default, then the driver default. */
export function effectiveTimeout(
  explicit: number | undefined,
  jobDefault: number | undefined,
  driverDefault: number | undefined,
): number | undefined {
  return explicit ?? jobDefault ?? driverDefault
}

// ── Placeholders ───────────────────────────────────────────────

/**
 * Rewrites `<marker>name` placeholders outside string literals, quoted
 * identifiers and comments. `replace` returning `undefined` keeps the
 * placeholder as written. A doubled marker (`@@rowcount`) is never a placeholder.
 */
export function rewriteNamedParameters(
  text: string,
  marker: string,
  replace: (name: string) => string | undefined,
): string {
  let out = ''
  let i = 0
  while (i < text.length) {
    const ch = text.charAt(i)
    const next = text.charAt(i + 1)

    if (ch === "'" || ch === '"') {
      const end = skipQuoted(text, i, ch)
      out += text.slice(i, end)
      i = end
      continue
    }
    if (ch === '-' && next === '-') {
      const eol = text.indexOf('\n', i)
      const end = eol === -1 ? text.length : eol
      out += text.slice(i, end)
      i = end
      continue
    }
    if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2)
      const end = close === -1 ? text.length : close + 2
      out += text.slice(i, end)
      i = end
      continue
    }

    if (text.startsWith(marker, i)) {
      const start = i + marker.length
      const prev = text[i - 1]
      if (prev !== undefined && (prev === marker.at(-1) || IDENT_CHAR.test(prev))) {
        out += marker
        i = start
        continue
      }
      let end = start
      while (end < text.length && IDENT_CHAR.test(text.charAt(end))) end++
      const name = text.slice(start, end)
      if (name.length > 0 && IDENT_START.test(name.charAt(0))) {
        out += replace(name) ?? `${marker}${name}`
        i = end
        continue
      }
      out += marker
      i = start
      continue
    }

    out += ch
    i++
  }
  return out
}

const IDENT_START = /[A-Za-z_]/
const IDENT_CHAR = /[A-Za-z0-9_]/

function skipQuoted(text: string, start: number, quote: string): number {
  let i = start + 1
  while (i < text.length) {
    if (text[i] === quote) {
      if (text[i + 1] === quote) {
        i += 2
        continue
      }
      return i + 1
    }
    i++
  }
  return text.length
}

// ── Array expansion ────────────────────────────────────────────

/**
 * For drivers without native array binding: `@ids` bound to `[1, 2]` becomes
 * `@ids_0, @ids_1` with one descriptor each. An empty array becomes `NULL`.
 */
export function expandArrayParameters(
  text: string,
  parameters: readonly ParameterDescriptor[],
  marker: string,
): { text: string; parameters: ParameterDescriptor[] } {
  const expanded: ParameterDescriptor[] = []
  const lists = new Map<string, string>()

  for (const param of parameters) {
    if (param.direction !== 'input' || !Array.isArray(param.value)) {
      expanded.push(param)
      continue
    }
    const items = param.value.map(
      (value: unknown, index: number): ParameterDescriptor => ({
        name: `${param.name}_${index}`,
        direction: 'input',
        typeHint: inferTypeHint(value),
        value: value ?? null,
      }),
    )
    lists.set(param.name.toLowerCase(), items.length === 0 ? 'NULL' : items.map((p) => `${marker}${p.name}`).join(', '))
    expanded.push(...items)
  }

  if (lists.size === 0) return { text, parameters: expanded }
  return {
    text: rewriteNamedParameters(text, marker, (name) => lists.get(name.toLowerCase())),
    parameters: expanded,
  }
}

// ── Builder ────────────────────────────────────────────────────

export interface BuildCommandInput {
  readonly connection: DriverConnection
  readonly transaction: DriverTransaction | undefined
  readonly capabilities: DriverCapabilities
  readonly spec: CommandSpec
  readonly parameters: readonly ParameterDescriptor[]
  /** Job-level timeout; the command's own timeout wins over it. */
  readonly timeoutMs: number | undefined
  /** Behavior implied by the requested result shape. The command's own flags win. */
  readonly behavior?: CommandBehavior | undefined
  readonly expectsRows: boolean
}

export function buildCommand(input: BuildCommandInput): DriverCommand {
  const { spec, capabilities } = input
  const invalid = validateCommandSpec(spec)
  if (invalid !== null) throw invalid

  const type = spec.type ?? 'text'
  let text = spec.text
  let parameters: readonly ParameterDescriptor[] = input.parameters
  if (capabilities.arrayParameters === 'expand' && type === 'text') {
    const expanded = expandArrayParameters(text, parameters, capabilities.parameterMarker)
    text = expanded.text
    parameters = expanded.parameters
  }

  const command = input.connection.prepareCommand({
    text,
    type,
    timeoutMs: effectiveTimeout(spec.timeoutMs, input.timeoutMs, capabilities.defaultTimeoutMs),
    behavior: { ...input.behavior, ...spec.behavior },
    expectsRows: input.expectsRows,
    transaction: input.transaction,
  })
  for (const param of parameters) {
    command.bindParameter(param)
  }
  return command
}
