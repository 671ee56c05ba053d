/**
 * Funnel Model
 *
 * Two fixed funnel variants share one storage shape: five ordered stage slots
 * plus a rejections counter. The variant only decides labels and prompts.
 */

export type FunnelType = 'active' | 'passive'

export const FUNNEL_TYPES: readonly FunnelType[] = ['active', 'passive']

export const STAGE_SLOTS = ['stage1', 'stage2', 'stage3', 'stage4', 'stage5'] as const
export type StageSlot = typeof STAGE_SLOTS[number]

export const COUNT_SLOTS = [...STAGE_SLOTS, 'rejections'] as const
export type CountSlot = typeof COUNT_SLOTS[number]

export type StageCounts = Record<CountSlot, number>

export type StageTuple = readonly [number, number, number, number, number]

const STAGE_LABELS: Record<FunnelType, readonly [string, string, string, string, string]> = {
  active: ['Applications', 'Responses', 'Screenings', 'Onsites', 'Offers'],
  passive: ['Views', 'Incoming', 'Screenings', 'Onsites', 'Offers'],
}

const FUNNEL_TITLES: Record<FunnelType, string> = {
  active: 'Active',
  passive: 'Passive',
}

export function isFunnelType(value: unknown): value is FunnelType {
  return value === 'active' || value === 'passive'
}

export function isCountSlot(value: string): value is CountSlot {
  return COUNT_SLOTS.some(slot => slot === value)
}

export function stageLabels(funnel: FunnelType): readonly string[] {
  return STAGE_LABELS[funnel]
}

export function otherFunnel(funnel: FunnelType): FunnelType {
  return funnel === 'active' ? 'passive' : 'active'
}

export function funnelTitle(funnel: FunnelType): string {
  return FUNNEL_TITLES[funnel]
}

export function slotLabel(funnel: FunnelType, slot: CountSlot): string {
  if (slot === 'rejections') return 'Rejections'
  return STAGE_LABELS[funnel][STAGE_SLOTS.indexOf(slot)]
}

/**
 * Resolve a user-typed field name ("responses", "views", "stage2") to a slot
 * for the given funnel. Returns null for names that don't belong to it.
 */
export function resolveSlot(funnel: FunnelType, name: string): CountSlot | null {
  const normalized = name.trim().toLowerCase()
  if (isCountSlot(normalized)) return normalized
  const index = STAGE_LABELS[funnel].findIndex(label => label.toLowerCase() === normalized)
  return index >= 0 ? STAGE_SLOTS[index] : null
}

export function emptyCounts(): StageCounts {
  return { stage1: 0, stage2: 0, stage3: 0, stage4: 0, stage5: 0, rejections: 0 }
}

export function toStageTuple(counts: StageCounts): StageTuple {
  return [counts.stage1, counts.stage2, counts.stage3, counts.stage4, counts.stage5]
}

export function addCounts(a: StageCounts, b: StageCounts): StageCounts {
  const out = emptyCounts()
  for (const slot of COUNT_SLOTS) out[slot] = a[slot] + b[slot]
  return out
}
