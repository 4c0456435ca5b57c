/**
 * Helper Utilities Unit Tests
 */

import { describe, it, expect } from 'vitest'
import {
    escapeHtml,
    extractBotToken,
    generateAnonymousId,
    periodTag,
    resolveLanguage,
    shortenToken,
} from '~/core/utils/helpers'

describe('helpers', () => {
    describe('extractBotToken', () => {
        it('should find the token inside surrounding text', () => {
            expect(extractBotToken('/register 123456:ABC-def_1 please')).toBe('123456:ABC-def_1')
        })

        it('should return an empty string when there is no token', () => {
            expect(extractBotToken('not a token')).toBe('')
            expect(extractBotToken(':abc')).toBe('')
        })
    })

    it('should shorten tokens for logs', () => {
        expect(shortenToken('123456:abcdef')).toBe('123…def')
        expect(shortenToken('abc')).toBe('abc')
    })

    it('should resolve supported languages and fall back to en', () => {
        expect(resolveLanguage('fa-IR')).toBe('fa')
        expect(resolveLanguage('FA')).toBe('fa')
        expect(resolveLanguage('de')).toBe('en')
        expect(resolveLanguage(undefined)).toBe('en')
    })

    it('should escape html special characters', () => {
        expect(escapeHtml('<b>Tom & Jerry</b>')).toBe('&lt;b&gt;Tom &amp; Jerry&lt;/b&gt;')
    })

    it('should tag periods by UTC year and month', () => {
        expect(periodTag(new Date(Date.UTC(2024, 4, 31, 23, 59)))).toBe('2024-05')
        expect(periodTag(new Date(Date.UTC(2025, 11, 1)))).toBe('2025-12')
    })

    describe('generateAnonymousId', () => {
        it('should give the same hashtag to the same user and first name', () => {
            const first = generateAnonymousId(555, 'Sam', true)
            const second = generateAnonymousId(555, 'Sam', true)

            expect(first).toBe(second)
            expect(first).toMatch(/^#[A-Za-z][A-Za-z0-9]{9}$/)
        })

        it('should change the label when the first name changes', () => {
            expect(generateAnonymousId(555, 'Sam', true)).not.toBe(generateAnonymousId(555, 'Alex', true))
        })

        it('should produce a plain label without history', () => {
            expect(generateAnonymousId(555, 'Sam')).toMatch(/^[A-Za-z][A-Za-z0-9]{9}$/)
        })
    })
})
