/**
 * Metrics Engine: stage-to-stage conversion rates.
 *
 * CVR_i = stage[i+1] / stage[i] as a whole percent. A zero denominator yields
 * `null` (rendered as a dash), never 0% and never an error.
 *
 * Rounding is half-to-even on the exact rational 100·a/b, done in integer
 * arithmetic so boundaries like 12.5% are not at the mercy of float error:
 *   1/8 → 12, 3/8 → 38, 1/200 → 0, 3/200 → 2
 */

import { COUNT_SLOTS, emptyCounts, toStageTuple } from './model.js'
import type { StageCounts, StageTuple } from './model.js'

export type ConversionRate = number | null

export type ConversionRates = readonly [ConversionRate, ConversionRate, ConversionRate, ConversionRate]

export const NO_RATE_DASH = '—'

export function roundPercentHalfEven(numerator: number, denominator: number): number {
  const scaled = numerator * 100
  const quotient = Math.floor(scaled / denominator)
  const remainder = scaled - quotient * denominator
  const twice = remainder * 2
  if (twice > denominator) return quotient + 1
  if (twice < denominator) return quotient
  return quotient % 2 === 0 ? quotient : quotient + 1
}

export function conversionRate(next: number, current: number): ConversionRate {
  if (current === 0) return null
  return roundPercentHalfEven(next, current)
}

export function computeConversionRates(stages: StageTuple): ConversionRates {
  return [
    conversionRate(stages[1], stages[0]),
    conversionRate(stages[2], stages[1]),
    conversionRate(stages[3], stages[2]),
    conversionRate(stages[4], stages[3]),
  ]
}

export function ratesForCounts(counts: StageCounts): ConversionRates {
  return computeConversionRates(toStageTuple(counts))
}

export function formatRate(rate: ConversionRate): string {
  return rate === null ? NO_RATE_DASH : `${rate}%`
}

export function sumCounts(rows: Iterable<StageCounts>): StageCounts {
  const total = emptyCounts()
  for (const row of rows) {
    for (const slot of COUNT_SLOTS) total[slot] += row[slot]
  }
  return total
}
