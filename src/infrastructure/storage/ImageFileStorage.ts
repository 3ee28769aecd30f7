/**
 * Local persistence of downloaded images.
 *
 * The caller owns the target path for the duration of the call; two writers
 * on the same path overwrite each other (last writer wins).
 */

import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { IOError } from '@/shared/errors/ComfyErrors'

export interface StoredFile {
  path: string
  bytesWritten: number
}

export class ImageFileStorage {
  async save(saveDir: string, filename: string, bytes: Uint8Array): Promise<StoredFile> {
    const fullPath = path.join(path.normalize(saveDir), filename)

    try {
      await mkdir(path.dirname(fullPath), { recursive: true })
      await writeFile(fullPath, bytes)
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error)
      console.error(`❌ [ImageFileStorage] Failed to write ${fullPath}:`, detail)
      throw new IOError('WriteFailed', `Could not write image to ${fullPath}: ${detail}`, {
        operation: 'fetchAndSave',
        path: fullPath,
        cause: error,
      })
    }

    console.log(`💾 [ImageFileStorage] Saved ${bytes.byteLength} bytes to ${fullPath}`)
    return { path: fullPath, bytesWritten: bytes.byteLength }
  }
}
