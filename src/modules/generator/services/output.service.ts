import fs from 'node:fs/promises'
import path from 'node:path'
import { randomBytes } from 'node:crypto'

export interface WriteResult {
  absolutePath: string
  size: number
}

async function ensureDir(dirPath: string) {
  await fs.mkdir(dirPath, { recursive: true })
}

function tempSibling(absolutePath: string): string {
  const token = randomBytes(6).toString('hex')
  return path.join(path.dirname(absolutePath), `.${path.basename(absolutePath)}.${token}.tmp`)
}

/**
 * Write `buffer` to `outputPath`, creating parent directories. The bytes land in
 * a temporary sibling first and are renamed into place, so a failed write never
 * leaves a partial file at the destination.
 */
export async function writeDocument(outputPath: string, buffer: Buffer): Promise<WriteResult> {
  const absolutePath = path.resolve(outputPath)
  await ensureDir(path.dirname(absolutePath))

  const tempPath = tempSibling(absolutePath)
  try {
    await fs.writeFile(tempPath, buffer)
    await fs.rename(tempPath, absolutePath)
  } catch (error) {
    await fs.rm(tempPath, { force: true })
    throw error
  }

  return { absolutePath, size: buffer.length }
}
