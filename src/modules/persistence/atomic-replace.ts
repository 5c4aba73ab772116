import path from 'node:path'
import type { Logger } from 'pino'
import { MetadataErrorCode } from '../../types'
import { MetadataError, describeError, errnoCode } from '../../errors/metadata-error'
import { logger as rootLogger } from '../../logger'
import type { FileSystem } from './file-system'

const FALLBACK_STEM = 'temp_pdf_update'

/** Wall-clock time in microseconds since the epoch. */
export function wallClockMicros(): number {
  return Math.round((performance.timeOrigin + performance.now()) * 1000)
}

/**
 * Sibling temp path for `targetPath`: `<dir>/<stem>_<micros>_<pid>.pdf.tmp`.
 * It stays in the target's directory so the final rename never crosses volumes.
 */
export function temporaryPathFor(targetPath: string, micros: number, pid: number = process.pid): string {
  const { dir, name } = path.parse(targetPath)
  const stem = name || FALLBACK_STEM
  return path.join(dir, `${stem}_${micros}_${pid}.pdf.tmp`)
}

export interface AtomicReplaceOptions {
  logger?: Logger
  /** Microsecond timestamp source for the temp name */
  now?: () => number
}

async function removeQuietly(fileSystem: FileSystem, tempPath: string, log: Logger): Promise<void> {
  try {
    await fileSystem.unlink(tempPath)
  } catch (err) {
    // Nothing was written if serialization failed first
    if (errnoCode(err) === 'ENOENT') return
    log.warn({ err, tempPath }, 'Could not remove temporary file')
  }
}

/**
 * Replace `targetPath` with the bytes `serialize` produces, via a temp file and a rename.
 *
 * The target either keeps its old content or gets the complete new content. On
 * failure the temp file is removed (best effort) and a SAVE_FAILED or
 * RENAME_FAILED error names the step that broke. Does not check that the target
 * exists, and gives no mutual exclusion between concurrent replacers.
 */
export async function replaceFileAtomically(
  fileSystem: FileSystem,
  targetPath: string,
  serialize: () => Promise<Uint8Array>,
  options: AtomicReplaceOptions = {}
): Promise<void> {
  const log = (options.logger ?? rootLogger).child({ module: 'atomic-replace' })
  const tempPath = temporaryPathFor(targetPath, (options.now ?? wallClockMicros)())

  try {
    const bytes = await serialize()
    await fileSystem.writeFile(tempPath, bytes)
    log.debug({ tempPath, size: bytes.length }, 'Wrote temporary file')
  } catch (err) {
    await removeQuietly(fileSystem, tempPath, log)
    throw new MetadataError(
      MetadataErrorCode.SAVE_FAILED,
      `Error saving to temporary file '${tempPath}': ${describeError(err)}`,
      { cause: err, details: { step: 'save', tempPath, targetPath } }
    )
  }

  try {
    await fileSystem.rename(tempPath, targetPath)
  } catch (err) {
    await removeQuietly(fileSystem, tempPath, log)
    throw new MetadataError(
      MetadataErrorCode.RENAME_FAILED,
      `Error renaming temporary file '${tempPath}' to original '${targetPath}': ${describeError(err)}`,
      { cause: err, details: { step: 'rename', tempPath, targetPath } }
    )
  }

  log.debug({ targetPath }, 'Replaced file')
}
