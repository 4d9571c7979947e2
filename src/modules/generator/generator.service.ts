import path from 'node:path'
import type { Logger } from 'pino'
import type { ComposedResume } from '../../types/document.types'
import type { Resume } from '../../types/resume.types'
import type { OutputFormat, PageSize, Theme } from '../../types/theme.types'
import { logger as rootLogger } from '../../logger'
import { composeResume } from './composer/section-composer'
import { DocxService } from './services/docx.service'
import { documentMetadataFor } from './services/metadata.util'
import type { DocumentMetadata } from './services/metadata.util'
import { writeDocument } from './services/output.service'
import { PdfMakeService } from './services/pdfmake.service'
import { DEFAULT_THEME, themeFor } from './themes/theme.registry'

export const DEFAULT_PAGE_SIZE: PageSize = 'letter'

export class GenerationError extends Error {
  readonly format: OutputFormat
  readonly outputPath: string

  constructor(format: OutputFormat, outputPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Error generating ${format.toUpperCase()}: ${reason}`, { cause })
    this.name = 'GenerationError'
    this.format = format
    this.outputPath = outputPath
  }
}

/** Turns composed blocks into the bytes of one output format. */
export interface ResumeRenderer {
  renderResume(
    composed: ComposedResume,
    theme: Theme,
    pageSize: PageSize,
    metadata: DocumentMetadata
  ): Promise<Buffer>
}

export interface DocumentGenerator {
  readonly format: OutputFormat
  generate(outputPath: string, resume: Resume, style?: string, pageSize?: PageSize): Promise<void>
}

interface GenerateRequest {
  format: OutputFormat
  renderer: ResumeRenderer
  log: Logger
  outputPath: string
  resume: Resume
  style: string
  pageSize: PageSize
}

async function generateDocument(request: GenerateRequest): Promise<void> {
  const { format, renderer, log, outputPath, resume, style, pageSize } = request
  const theme = themeFor(style)
  if (theme.name !== style.trim().toLowerCase()) {
    log.debug({ style, theme: theme.name }, 'Unknown style, using default theme')
  }

  try {
    const composed = composeResume(resume)
    const buffer = await renderer.renderResume(composed, theme, pageSize, documentMetadataFor(resume))
    const { absolutePath, size } = await writeDocument(outputPath, buffer)
    log.info({ format, outputPath: absolutePath, size, theme: theme.name, pageSize }, 'Résumé generated')
  } catch (error) {
    log.error({ err: error, format, outputPath }, 'Résumé generation failed')
    throw new GenerationError(format, outputPath, error)
  }
}

export class PdfResumeGenerator implements DocumentGenerator {
  readonly format = 'pdf'

  constructor(
    private readonly renderer: ResumeRenderer = new PdfMakeService(),
    private readonly log: Logger = rootLogger
  ) {}

  generate(
    outputPath: string,
    resume: Resume,
    style: string = DEFAULT_THEME,
    pageSize: PageSize = DEFAULT_PAGE_SIZE
  ): Promise<void> {
    return generateDocument({
      format: this.format,
      renderer: this.renderer,
      log: this.log,
      outputPath,
      resume,
      style,
      pageSize
    })
  }
}

export class DocxResumeGenerator implements DocumentGenerator {
  readonly format = 'docx'

  constructor(
    private readonly renderer: ResumeRenderer = new DocxService(),
    private readonly log: Logger = rootLogger
  ) {}

  generate(
    outputPath: string,
    resume: Resume,
    style: string = DEFAULT_THEME,
    pageSize: PageSize = DEFAULT_PAGE_SIZE
  ): Promise<void> {
    return generateDocument({
      format: this.format,
      renderer: this.renderer,
      log: this.log,
      outputPath,
      resume,
      style,
      pageSize
    })
  }
}

export function createGenerator(format: OutputFormat, log: Logger = rootLogger): DocumentGenerator {
  switch (format) {
    case 'pdf':
      return new PdfResumeGenerator(new PdfMakeService(log), log)
    case 'docx':
      return new DocxResumeGenerator(new DocxService(log), log)
  }
}

/** Output format implied by a file extension, compared case-insensitively. */
export function inferFormat(outputPath: string): OutputFormat | undefined {
  switch (path.extname(outputPath).toLowerCase()) {
    case '.pdf':
      return 'pdf'
    case '.docx':
      return 'docx'
    default:
      return undefined
  }
}
