/**
 * Input parsers shared by the wizards. Each returns either a value or a
 * human-readable reason the step re-prompts with.
 */

import type { Salary } from '../types/schemas.js'

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string }

export const MAX_COUNT = 100_000

export function parseCount(input: string): Parsed<number> {
    const text = input.trim()
    if (!/^\d+$/.test(text)) {
        return { ok: false, error: 'Enter a whole number, 0 or more.' }
    }
    const value = Number(text)
    if (value > MAX_COUNT) {
        return { ok: false, error: `That looks too large. Enter a number up to ${MAX_COUNT}.` }
    }
    return { ok: true, value }
}

export function parseIntInRange(input: string, min: number, max: number): Parsed<number> {
    const text = input.trim()
    const value = Number(text)
    if (!/^-?\d+$/.test(text) || value < min || value > max) {
        return { ok: false, error: `Enter a whole number from ${min} to ${max}.` }
    }
    return { ok: true, value }
}

export function parseText(input: string, max: number, min = 1): Parsed<string> {
    const value = input.trim()
    if (value.length < min) {
        return { ok: false, error: min === 1 ? 'This can’t be empty.' : `Enter at least ${min} characters.` }
    }
    if (value.length > max) {
        return { ok: false, error: `Keep it under ${max + 1} characters (got ${value.length}).` }
    }
    return { ok: true, value }
}

/** Comma or newline separated list; blank items dropped, duplicates rejected. */
export function parseList(
    input: string,
    limits: { max: number; min?: number; itemMax?: number },
): Parsed<string[]> {
    const items = input
        .split(/[,\n]/)
        .map(item => item.trim())
        .filter(item => item.length > 0)

    const min = limits.min ?? 1
    if (items.length < min) {
        return { ok: false, error: min === 1 ? 'Enter at least one item.' : `Enter at least ${min} items, separated by commas.` }
    }
    if (items.length > limits.max) {
        return { ok: false, error: `At most ${limits.max} items, please.` }
    }
    const itemMax = limits.itemMax ?? 100
    if (items.some(item => item.length > itemMax)) {
        return { ok: false, error: `Each item must be under ${itemMax + 1} characters.` }
    }
    if (new Set(items.map(item => item.toLowerCase())).size !== items.length) {
        return { ok: false, error: 'Items must not repeat.' }
    }
    return { ok: true, value: items }
}

const SALARY_PATTERN = /(\d+(?:\.\d+)?)\s*[-–]\s*(\d+(?:\.\d+)?)\s+([A-Z]{3}|[$€£¥₽])\s*[/\s]*\s*(month|year)/i

/** "3000-5000 EUR/month" or "3000-5000 USD year". */
export function parseSalary(input: string): Parsed<Salary> {
    const match = SALARY_PATTERN.exec(input)
    if (!match) {
        return { ok: false, error: 'Format: 3000-5000 EUR/month or 3000-5000 USD year.' }
    }
    const [, minText, maxText, currency, period] = match
    const min = Number(minText)
    const max = Number(maxText)
    if (min <= 0 || max <= 0) {
        return { ok: false, error: 'Salary must be above zero.' }
    }
    if (max < min) {
        return { ok: false, error: 'The maximum must not be below the minimum.' }
    }
    return {
        ok: true,
        value: {
            min,
            max,
            currency: currency.toUpperCase(),
            period: period.toLowerCase() === 'year' ? 'year' : 'month',
        },
    }
}

export function parseUrl(input: string): Parsed<string> {
    const text = input.trim()
    try {
        const url = new URL(text)
        if (url.protocol !== 'http:' && url.protocol !== 'https:') {
            return { ok: false, error: 'Send an http(s) link.' }
        }
        return { ok: true, value: text }
    } catch {
        return { ok: false, error: 'That doesn’t look like a link. Send a full URL, e.g. https://linkedin.com/in/you' }
    }
}

export function formatSalary(salary: Salary): string {
    return `${salary.min}-${salary.max} ${salary.currency}/${salary.period}`
}
