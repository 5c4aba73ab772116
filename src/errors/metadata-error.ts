import {
  MetadataErrorCode,
  getMetadataErrorDefinition,
  isMetadataErrorCode
} from '../types'

export class MetadataError extends Error {
  code: MetadataErrorCode
  details?: Record<string, unknown>

  constructor(
    code: MetadataErrorCode,
    message?: string,
    options?: {
      details?: Record<string, unknown>
      cause?: unknown
    }
  ) {
    const definition = getMetadataErrorDefinition(code)
    super(message ?? definition.defaultMessage, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'MetadataError'
    this.code = code
    this.details = options?.details
  }

  get exitCode(): number {
    return getMetadataErrorDefinition(this.code).exitCode
  }
}

export function isMetadataError(err: unknown): err is MetadataError {
  return err instanceof MetadataError
}

export interface NormalizedError {
  code: MetadataErrorCode
  message: string
  exitCode: number
  details?: Record<string, unknown>
  stack?: string
}

/**
 * Flatten anything thrown into the shape the CLI reports.
 */
export const normalizeError = (err: unknown): NormalizedError => {
  if (err instanceof MetadataError) {
    return {
      code: err.code,
      message: err.message,
      exitCode: err.exitCode,
      details: err.details,
      stack: err.stack
    }
  }

  if (err instanceof Error) {
    const maybeCode: unknown = 'code' in err ? err.code : undefined
    const code = isMetadataErrorCode(maybeCode) ? maybeCode : MetadataErrorCode.INTERNAL_ERROR
    return {
      code,
      message: err.message || getMetadataErrorDefinition(code).defaultMessage,
      exitCode: getMetadataErrorDefinition(code).exitCode,
      stack: err.stack
    }
  }

  const definition = getMetadataErrorDefinition(MetadataErrorCode.INTERNAL_ERROR)
  return {
    code: MetadataErrorCode.INTERNAL_ERROR,
    message: typeof err === 'string' && err ? err : definition.defaultMessage,
    exitCode: definition.exitCode
  }
}

/** Node's errno code (ENOENT, EACCES, ...) when present. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
