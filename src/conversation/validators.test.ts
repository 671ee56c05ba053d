import { describe, it, expect } from 'vitest'
import { formatSalary, parseCount, parseIntInRange, parseList, parseSalary, parseText, parseUrl } from './validators.js'

describe('parseCount', () => {
    it('accepts zero and positive whole numbers', () => {
        expect(parseCount(' 0 ')).toEqual({ ok: true, value: 0 })
        expect(parseCount('42')).toEqual({ ok: true, value: 42 })
    })

    it('rejects negatives, fractions and words', () => {
        for (const input of ['-1', '2.5', 'five', '']) {
            expect(parseCount(input)).toEqual({ ok: false, error: 'Enter a whole number, 0 or more.' })
        }
    })

    it('caps absurd values', () => {
        expect(parseCount('100001')).toEqual({ ok: false, error: 'That looks too large. Enter a number up to 100000.' })
    })
})

describe('parseIntInRange / parseText', () => {
    it('enforces the range', () => {
        expect(parseIntInRange('52', 1, 52)).toEqual({ ok: true, value: 52 })
        expect(parseIntInRange('53', 1, 52)).toEqual({ ok: false, error: 'Enter a whole number from 1 to 52.' })
        expect(parseIntInRange('0', 1, 52).ok).toBe(false)
    })

    it('trims text and enforces length', () => {
        expect(parseText('  Berlin ', 100)).toEqual({ ok: true, value: 'Berlin' })
        expect(parseText('   ', 100)).toEqual({ ok: false, error: 'This can’t be empty.' })
        expect(parseText('abcdef', 5)).toEqual({ ok: false, error: 'Keep it under 6 characters (got 6).' })
    })
})

describe('parseList', () => {
    it('splits on commas and newlines', () => {
        expect(parseList('Go, Rust\nTypeScript,,', { max: 5 })).toEqual({ ok: true, value: ['Go', 'Rust', 'TypeScript'] })
    })

    it('checks the item count and duplicates', () => {
        expect(parseList('a, b', { min: 3, max: 5 })).toEqual({ ok: false, error: 'Enter at least 3 items, separated by commas.' })
        expect(parseList('a, b, c, d', { max: 3 })).toEqual({ ok: false, error: 'At most 3 items, please.' })
        expect(parseList('Fintech, fintech', { max: 3 })).toEqual({ ok: false, error: 'Items must not repeat.' })
    })
})

describe('parseSalary', () => {
    it('reads a range with currency and period', () => {
        expect(parseSalary('3000-5000 eur/month')).toEqual({
            ok: true,
            value: { min: 3000, max: 5000, currency: 'EUR', period: 'month' },
        })
        expect(parseSalary('60000 - 80000 USD year')).toEqual({
            ok: true,
            value: { min: 60000, max: 80000, currency: 'USD', period: 'year' },
        })
    })

    it('rejects malformed and inverted ranges', () => {
        expect(parseSalary('lots')).toEqual({ ok: false, error: 'Format: 3000-5000 EUR/month or 3000-5000 USD year.' })
        expect(parseSalary('5000-3000 EUR/month')).toEqual({ ok: false, error: 'The maximum must not be below the minimum.' })
        expect(parseSalary('0-3000 EUR/month')).toEqual({ ok: false, error: 'Salary must be above zero.' })
    })

    it('formats back to the input shape', () => {
        expect(formatSalary({ min: 3000, max: 5000, currency: 'EUR', period: 'month' })).toBe('3000-5000 EUR/month')
    })
})

describe('parseUrl', () => {
    it('accepts only http(s) links', () => {
        expect(parseUrl('https://linkedin.com/in/test-user')).toEqual({ ok: true, value: 'https://linkedin.com/in/test-user' })
        expect(parseUrl('ftp://example.com')).toEqual({ ok: false, error: 'Send an http(s) link.' })
        expect(parseUrl('linkedin').ok).toBe(false)
    })
})
