/**
 * Metadata Error Types
 *
 * Error codes shared by the library surface and the CLI.
 */

export enum MetadataErrorCode {
  // Input errors
  NOT_FOUND = 'NOT_FOUND',
  INVALID_KEY = 'INVALID_KEY',

  // Container errors
  MALFORMED_CONTAINER = 'MALFORMED_CONTAINER',
  ENCRYPTED_CONTAINER = 'ENCRYPTED_CONTAINER',

  // Entry errors
  ENTRY_NOT_FOUND = 'ENTRY_NOT_FOUND',
  ENTRY_EXISTS = 'ENTRY_EXISTS',

  // Persistence errors
  SAVE_FAILED = 'SAVE_FAILED',
  RENAME_FAILED = 'RENAME_FAILED',

  // System errors
  INVALID_CONFIG = 'INVALID_CONFIG',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Optional metadata describing an error code.
 *
 * defaultMessage: developer-facing default message
 * exitCode: process exit code the CLI uses for this code
 */
export interface MetadataErrorDefinition {
  code: MetadataErrorCode
  defaultMessage: string
  exitCode: number
}

export const METADATA_ERROR_DEFINITIONS: Record<MetadataErrorCode, MetadataErrorDefinition> = {
  [MetadataErrorCode.NOT_FOUND]: {
    code: MetadataErrorCode.NOT_FOUND,
    defaultMessage: 'File not found',
    exitCode: 2
  },
  [MetadataErrorCode.INVALID_KEY]: {
    code: MetadataErrorCode.INVALID_KEY,
    defaultMessage: 'Metadata key must not be blank',
    exitCode: 64
  },
  [MetadataErrorCode.MALFORMED_CONTAINER]: {
    code: MetadataErrorCode.MALFORMED_CONTAINER,
    defaultMessage: 'Input is not a readable PDF document',
    exitCode: 65
  },
  [MetadataErrorCode.ENCRYPTED_CONTAINER]: {
    code: MetadataErrorCode.ENCRYPTED_CONTAINER,
    defaultMessage: 'Encrypted PDF documents are not supported',
    exitCode: 65
  },
  [MetadataErrorCode.ENTRY_NOT_FOUND]: {
    code: MetadataErrorCode.ENTRY_NOT_FOUND,
    defaultMessage: 'Metadata key not found',
    exitCode: 3
  },
  [MetadataErrorCode.ENTRY_EXISTS]: {
    code: MetadataErrorCode.ENTRY_EXISTS,
    defaultMessage: 'Metadata key already exists',
    exitCode: 3
  },
  [MetadataErrorCode.SAVE_FAILED]: {
    code: MetadataErrorCode.SAVE_FAILED,
    defaultMessage: 'Failed to save PDF document',
    exitCode: 74
  },
  [MetadataErrorCode.RENAME_FAILED]: {
    code: MetadataErrorCode.RENAME_FAILED,
    defaultMessage: 'Failed to replace the original file',
    exitCode: 74
  },
  [MetadataErrorCode.INVALID_CONFIG]: {
    code: MetadataErrorCode.INVALID_CONFIG,
    defaultMessage: 'Invalid environment configuration',
    exitCode: 78
  },
  [MetadataErrorCode.INTERNAL_ERROR]: {
    code: MetadataErrorCode.INTERNAL_ERROR,
    defaultMessage: 'Unexpected error',
    exitCode: 1
  },
}

export function isMetadataErrorCode(code: unknown): code is MetadataErrorCode {
  return typeof code === 'string' && code in METADATA_ERROR_DEFINITIONS
}

export function getMetadataErrorDefinition(code: MetadataErrorCode | string): MetadataErrorDefinition {
  if (isMetadataErrorCode(code)) {
    return METADATA_ERROR_DEFINITIONS[code]
  }
  return METADATA_ERROR_DEFINITIONS[MetadataErrorCode.INTERNAL_ERROR]
}
