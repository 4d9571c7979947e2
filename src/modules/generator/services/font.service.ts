import { execFileSync } from 'node:child_process'
import fs from 'node:fs'
import type { Logger } from 'pino'
import type { PdfFontFamily, Theme } from '../../../types/theme.types'
import { env } from '../../../config/env'
import { logger as rootLogger } from '../../../logger'

export type FaceSlot = 'normal' | 'bold' | 'italics' | 'bolditalics'
type PdfFaceName = PdfFontFamily | `${PdfFontFamily}-${'Bold' | 'Italic' | 'BoldItalic'}`

interface FaceSource {
  /** fontconfig pattern */
  pattern: string
  /** PDF standard-14 fallback */
  builtin: string
}

const FACES: Readonly<Record<PdfFaceName, FaceSource>> = {
  LiberationSans: { pattern: 'Liberation Sans:style=Regular', builtin: 'Helvetica' },
  'LiberationSans-Bold': { pattern: 'Liberation Sans:style=Bold', builtin: 'Helvetica-Bold' },
  'LiberationSans-Italic': { pattern: 'Liberation Sans:style=Italic', builtin: 'Helvetica-Oblique' },
  'LiberationSans-BoldItalic': { pattern: 'Liberation Sans:style=Bold Italic', builtin: 'Helvetica-BoldOblique' },
  LiberationSerif: { pattern: 'Liberation Serif:style=Regular', builtin: 'Times-Roman' },
  'LiberationSerif-Bold': { pattern: 'Liberation Serif:style=Bold', builtin: 'Times-Bold' },
  'LiberationSerif-Italic': { pattern: 'Liberation Serif:style=Italic', builtin: 'Times-Italic' },
  'LiberationSerif-BoldItalic': { pattern: 'Liberation Serif:style=Bold Italic', builtin: 'Times-BoldItalic' }
}

const FC_MATCH_TIMEOUT_MS = 5_000

/** Returns the font file fontconfig picks for a pattern, if any. */
export type FontLocator = (pattern: string) => string | undefined

export const fcMatch: FontLocator = (pattern) => {
  try {
    const file = execFileSync('fc-match', ['-f', '%{file}', pattern], {
      encoding: 'utf8',
      timeout: FC_MATCH_TIMEOUT_MS,
      stdio: ['ignore', 'pipe', 'ignore']
    }).trim()
    return file || undefined
  } catch {
    // fontconfig missing or timed out: caller falls back to built-in faces
    return undefined
  }
}

export interface ResolvedFonts {
  /** File paths when embedded, standard font names otherwise. */
  faces: Record<FaceSlot, string>
  embedded: boolean
}

export interface FontServiceOptions {
  discovery?: boolean
  locate?: FontLocator
  log?: Logger
}

/**
 * Maps a theme's PDF faces to TrueType files found through fontconfig.
 * A family is embedded only when all four faces resolve; otherwise the
 * matching PDF standard fonts are used for the whole family.
 */
export class FontService {
  private readonly cache = new Map<PdfFontFamily, ResolvedFonts>()
  private readonly discovery: boolean
  private readonly locate: FontLocator
  private readonly log: Logger

  constructor(options: FontServiceOptions = {}) {
    this.discovery = options.discovery ?? env.RESUME_FONT_DISCOVERY
    this.locate = options.locate ?? fcMatch
    this.log = options.log ?? rootLogger
  }

  resolve(theme: Theme): ResolvedFonts {
    const cached = this.cache.get(theme.pdfFont)
    if (cached) return cached

    const names: Record<FaceSlot, PdfFaceName> = {
      normal: theme.pdfFont,
      bold: theme.pdfBoldFont,
      italics: `${theme.pdfFont}-Italic`,
      bolditalics: `${theme.pdfFont}-BoldItalic`
    }
    const resolved = this.discover(theme.pdfFont, names) ?? {
      faces: {
        normal: FACES[names.normal].builtin,
        bold: FACES[names.bold].builtin,
        italics: FACES[names.italics].builtin,
        bolditalics: FACES[names.bolditalics].builtin
      },
      embedded: false
    }
    this.cache.set(theme.pdfFont, resolved)
    return resolved
  }

  private discover(family: PdfFontFamily, names: Record<FaceSlot, PdfFaceName>): ResolvedFonts | undefined {
    if (!this.discovery) return undefined

    const normal = this.findFace(names.normal)
    const bold = this.findFace(names.bold)
    const italics = this.findFace(names.italics)
    const bolditalics = this.findFace(names.bolditalics)
    if (!normal || !bold || !italics || !bolditalics) {
      this.log.debug({ family }, 'TrueType faces not found, using standard PDF fonts')
      return undefined
    }

    this.log.debug({ family, normal }, 'Embedding TrueType fonts')
    return { faces: { normal, bold, italics, bolditalics }, embedded: true }
  }

  private findFace(name: PdfFaceName): string | undefined {
    const file = this.locate(FACES[name].pattern)
    if (!file || !file.toLowerCase().endsWith('.ttf')) return undefined
    return fs.existsSync(file) ? file : undefined
  }
}
