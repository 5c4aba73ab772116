import { afterEach, describe, expect, it, vi } from 'vitest'
import { validateEnv } from '../env'

describe('env', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.resetModules()
  })

  it('falls back to defaults for unlisted values', async () => {
    vi.stubEnv('NODE_ENV', 'staging')
    vi.stubEnv('LOG_LEVEL', 'loud')
    vi.stubEnv('PDF_INFO_ENCODE_NON_ASCII', 'maybe')
    vi.resetModules()

    const { env } = await import('../env')

    expect(env).toEqual({ NODE_ENV: 'production', LOG_LEVEL: undefined, PDF_INFO_ENCODE_NON_ASCII: true })
  })

  it('keeps listed values', async () => {
    vi.stubEnv('NODE_ENV', 'development')
    vi.stubEnv('LOG_LEVEL', 'warn')
    vi.stubEnv('PDF_INFO_ENCODE_NON_ASCII', '0')
    vi.resetModules()

    const { env } = await import('../env')

    expect(env).toEqual({ NODE_ENV: 'development', LOG_LEVEL: 'warn', PDF_INFO_ENCODE_NON_ASCII: false })
  })

  it('lets the library entry load under an unlisted NODE_ENV', async () => {
    vi.stubEnv('NODE_ENV', 'staging')
    vi.resetModules()

    const library = await import('../../index')

    expect(typeof library.getMetadataFromBytes).toBe('function')
    expect(library.metadataService).toBeInstanceOf(library.MetadataService)
  })
})

describe('validateEnv', () => {
  it('applies defaults to an empty environment', () => {
    expect(validateEnv({})).toEqual({
      ok: true,
      value: { NODE_ENV: 'production', PDF_INFO_ENCODE_NON_ASCII: true }
    })
  })

  it('reports unlisted values by variable name', () => {
    const result = validateEnv({ NODE_ENV: 'staging' })
    expect(result.ok).toBe(false)
    expect(!result.ok && result.error).toMatch(/^NODE_ENV: Invalid enum value/)
  })

  it('reports every bad variable', () => {
    const result = validateEnv({ LOG_LEVEL: 'loud', PDF_INFO_ENCODE_NON_ASCII: 'maybe' })
    expect(!result.ok && result.error.split('; ').map((part) => part.split(':')[0])).toEqual([
      'LOG_LEVEL',
      'PDF_INFO_ENCODE_NON_ASCII'
    ])
  })
})
