import type { ColumnInfo, ColumnMapSettings } from '@dbjob/validation'

/** Binding of one segment schema to one row shape. */
export interface MappingPlan<T> {
  readonly columns: readonly ColumnInfo[]
  map(read: (index: number) => unknown): T
}

const settingsIds = new WeakMap<ColumnMapSettings, number>()
let nextSettingsId = 1

function settingsKey(settings: ColumnMapSettings | undefined): string {
  if (settings === undefined) return '-'
  let id = settingsIds.get(settings)
  if (id === undefined) {
    id = nextSettingsId++
    settingsIds.set(settings, id)
  }
  return String(id)
}

export function schemaSignature(columns: readonly ColumnInfo[], settings?: ColumnMapSettings): string {
  return `${settingsKey(settings)}|${columns.map((c) => `${c.name}:${c.type}`).join(',')}`
}

/**
 * Plans for one shape, keyed by segment schema and map settings identity.
 * Every run whose segment has the same columns reuses the plan.
 */
export class PlanCache<T> {
  private readonly plans = new Map<string, MappingPlan<T>>()

  get(
    columns: readonly ColumnInfo[],
    settings: ColumnMapSettings | undefined,
    build: () => MappingPlan<T>,
  ): MappingPlan<T> {
    const key = schemaSignature(columns, settings)
    const cached = this.plans.get(key)
    if (cached !== undefined) return cached
    const plan = build()
    this.plans.set(key, plan)
    return plan
  }

  get size(): number {
    return this.plans.size
  }
}
