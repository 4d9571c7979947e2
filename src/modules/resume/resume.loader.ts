import fs from 'node:fs/promises'
import type { Logger } from 'pino'
import { env } from '../../config/env'
import { logger as rootLogger } from '../../logger'
import type { Resume } from '../../types/resume.types'
import { PROGRAM_NAME, VERSION } from '../../version'
import { parseResume } from './resume.validator'

export type ResumeLoadErrorKind = 'not_found' | 'read' | 'invalid_json' | 'http' | 'network'

export class ResumeLoadError extends Error {
  readonly kind: ResumeLoadErrorKind

  constructor(kind: ResumeLoadErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ResumeLoadError'
    this.kind = kind
  }
}

export interface LoadOptions {
  timeoutMs?: number
  log?: Logger
}

export function isUrl(source: string): boolean {
  return source.startsWith('http://') || source.startsWith('https://')
}

function parseJson(raw: string, origin: string): unknown {
  try {
    return JSON.parse(raw)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ResumeLoadError('invalid_json', `Invalid JSON in ${origin}: ${reason}`, { cause: error })
  }
}

async function readLocalFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ResumeLoadError('not_found', `File not found: ${filePath}`, { cause: error })
    }
    const reason = error instanceof Error ? error.message : String(error)
    throw new ResumeLoadError('read', `Error reading input file: ${reason}`, { cause: error })
  }
}

async function fetchRemote(url: string, timeoutMs: number, log: Logger): Promise<string> {
  let response: Response
  try {
    response = await fetch(url, {
      headers: { 'User-Agent': `${PROGRAM_NAME}/${VERSION}`, Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs)
    })
  } catch (error) {
    log.warn({ err: error, url }, 'Failed to fetch resume')
    const reason = error instanceof Error ? error.message : String(error)
    throw new ResumeLoadError('network', `Error fetching URL: ${reason}`, { cause: error })
  }

  if (!response.ok) {
    log.warn({ url, status: response.status }, 'Resume URL returned an error status')
    throw new ResumeLoadError('http', `HTTP error fetching URL: ${response.status} ${response.statusText}`.trim())
  }
  return response.text()
}

/**
 * Read raw résumé JSON from a local path or an http(s) URL.
 */
export async function loadResumeSource(source: string, options: LoadOptions = {}): Promise<unknown> {
  const log = options.log ?? rootLogger
  if (isUrl(source)) {
    const body = await fetchRemote(source, options.timeoutMs ?? env.RESUME_FETCH_TIMEOUT_MS, log)
    return parseJson(body, 'response from URL')
  }
  const body = await readLocalFile(source)
  return parseJson(body, 'input file')
}

export async function loadResume(source: string, options: LoadOptions = {}): Promise<Resume> {
  return parseResume(await loadResumeSource(source, options))
}
