import { describe, expect, it } from 'vitest'
import { EnvSchema } from '../env'

describe('EnvSchema', () => {
  it('applies defaults', () => {
    expect(EnvSchema.parse({})).toEqual({
      NODE_ENV: 'production',
      RESUME_FETCH_TIMEOUT_MS: 30000,
      RESUME_FONT_DISCOVERY: true
    })
  })

  it('coerces numbers and flags', () => {
    const env = EnvSchema.parse({
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      RESUME_FETCH_TIMEOUT_MS: '500',
      RESUME_FONT_DISCOVERY: 'false'
    })
    expect(env).toEqual({
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      RESUME_FETCH_TIMEOUT_MS: 500,
      RESUME_FONT_DISCOVERY: false
    })
  })

  it('rejects invalid values', () => {
    expect(() => EnvSchema.parse({ LOG_LEVEL: 'loud' })).toThrow()
    expect(() => EnvSchema.parse({ RESUME_FETCH_TIMEOUT_MS: '-1' })).toThrow()
    expect(() => EnvSchema.parse({ RESUME_FONT_DISCOVERY: 'yes' })).toThrow()
  })
})
