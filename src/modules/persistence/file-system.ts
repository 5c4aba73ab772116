/**
 * File system capability used by the metadata service.
 *
 * Only the operations the atomic-replace protocol and the path-based entry
 * points need. Paths are passed through unchanged.
 */

import fs from 'node:fs/promises'
import { errnoCode } from '../../errors/metadata-error'

export type FileOperation = 'readFile' | 'writeFile' | 'rename' | 'unlink'

export interface FileSystem {
  /** True if something exists at the path. Errors other than ENOENT reject */
  exists(path: string): Promise<boolean>

  /**
   * Read the whole file
   * @throws Error with code "ENOENT" if the file does not exist
   */
  readFile(path: string): Promise<Uint8Array>

  /** Create or truncate the file and write all bytes */
  writeFile(path: string, data: Uint8Array): Promise<void>

  /** Move a file, replacing the destination if it exists */
  rename(fromPath: string, toPath: string): Promise<void>

  /** Delete a file */
  unlink(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path)
      return true
    } catch (err) {
      // EACCES, ENOTDIR and the like are I/O errors, not absence
      if (errnoCode(err) === 'ENOENT') return false
      throw err
    }
  }

  async readFile(path: string): Promise<Uint8Array> {
    return fs.readFile(path)
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    await fs.writeFile(path, data)
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    await fs.rename(fromPath, toPath)
  }

  async unlink(path: string): Promise<void> {
    await fs.unlink(path)
  }
}

export const nodeFileSystem = new NodeFileSystem()
