#!/usr/bin/env node
import { validateEnv } from '../config/env'
import { MetadataErrorCode, getMetadataErrorDefinition } from '../types'
import { run } from './pdf-info.cli'

const checked = validateEnv()

if (!checked.ok) {
  console.error(`Error [${MetadataErrorCode.INVALID_CONFIG}]: ${checked.error}`)
  process.exitCode = getMetadataErrorDefinition(MetadataErrorCode.INVALID_CONFIG).exitCode
} else {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((err: unknown) => {
      console.error('[pdf-info] unexpected failure', err)
      process.exitCode = 1
    })
}
