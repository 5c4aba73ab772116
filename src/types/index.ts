export * from './metadata.types'
export * from './metadata-error.types'
