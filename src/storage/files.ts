/**
 * Private file helpers
 *
 * Directories are created 0700 and files 0600. Writes go to a temp file
 * first and are renamed into place, so readers see the old record or the
 * new one, never a partial write.
 */

import { randomUUID } from 'node:crypto'
import { chmod, mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

export async function ensurePrivateDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true, mode: 0o700 })
}

export async function writePrivateFile(path: string, content: string | Uint8Array): Promise<void> {
  await ensurePrivateDir(dirname(path))
  const tmpPath = `${path}.${randomUUID()}.tmp`
  try {
    await writeFile(tmpPath, content, { mode: 0o600 })
    await chmod(tmpPath, 0o600)
    await rename(tmpPath, path)
  } catch (error) {
    await removeFile(tmpPath)
    throw error
  }
}

/**
 * Read a file, or null when it does not exist. Other I/O errors propagate.
 */
export async function readOptionalFile(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path)
  } catch (error) {
    if (isNotFound(error)) return null
    throw error
  }
}

/**
 * Delete a file; a missing file is not an error.
 */
export async function removeFile(path: string): Promise<void> {
  try {
    await unlink(path)
  } catch (error) {
    if (!isNotFound(error)) throw error
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
