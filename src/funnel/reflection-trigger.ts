/**
 * Reflection Trigger
 *
 * Compares the stored row before and after a submission. Only the stages past
 * the top of the funnel qualify; a positive delta on any of them earns one
 * combined reflection prompt. Decreases are corrections and never qualify.
 */

import { slotLabel } from './model.js'
import type { CountSlot, FunnelType, StageCounts } from './model.js'

export type QualifyingStage = 'responses' | 'screenings' | 'onsites' | 'offers' | 'rejections'

export const QUALIFYING_SLOTS: ReadonlyArray<{ slot: CountSlot; stage: QualifyingStage }> = [
  { slot: 'stage2', stage: 'responses' },
  { slot: 'stage3', stage: 'screenings' },
  { slot: 'stage4', stage: 'onsites' },
  { slot: 'stage5', stage: 'offers' },
  { slot: 'rejections', stage: 'rejections' },
]

export interface QualifyingIncrease {
  stage: QualifyingStage
  slot: CountSlot
  label: string
  delta: number
}

export function detectQualifyingStages(
  previous: StageCounts,
  current: StageCounts,
  funnel: FunnelType = 'active',
): QualifyingIncrease[] {
  const increases: QualifyingIncrease[] = []
  for (const { slot, stage } of QUALIFYING_SLOTS) {
    const delta = current[slot] - previous[slot]
    if (delta > 0) {
      increases.push({ stage, slot, label: slotLabel(funnel, slot), delta })
    }
  }
  return increases
}

export function isRejectionStage(stage: QualifyingStage): boolean {
  return stage === 'rejections'
}
