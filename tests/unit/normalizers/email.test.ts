import { describe, it, expect } from 'vitest'
import { isValidEmail, normalizeEmail } from '../../../src/core/normalizers/email'

describe('isValidEmail', () => {
  it('should accept well-formed addresses', () => {
    expect(isValidEmail('user@example.com')).toBe(true)
    expect(isValidEmail('first.last+tag@sub.example.org')).toBe(true)
  })

  it('should reject malformed addresses', () => {
    expect(isValidEmail('user@example')).toBe(false)
    expect(isValidEmail('user@@example.com')).toBe(false)
    expect(isValidEmail('user example@test.com')).toBe(false)
    expect(isValidEmail('@example.com')).toBe(false)
    expect(isValidEmail('')).toBe(false)
  })
})

describe('normalizeEmail', () => {
  it('should trim and lowercase', () => {
    expect(normalizeEmail('  John@Example.Com ')).toBe('john@example.com')
  })

  it('should discard invalid values', () => {
    expect(normalizeEmail('john at example.com')).toBeNull()
    expect(normalizeEmail(null)).toBeNull()
    expect(normalizeEmail(42)).toBeNull()
  })
})
