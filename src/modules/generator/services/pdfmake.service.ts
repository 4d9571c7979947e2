import PdfPrinter from 'pdfmake'
import type { Content, StyleDictionary, TDocumentDefinitions } from 'pdfmake/interfaces'
import type { Logger } from 'pino'
import type { ComposedResume, ComposedSection, StyledBlock, TextSpan } from '../../../types/document.types'
import type { PageSize, Theme } from '../../../types/theme.types'
import { logger as rootLogger } from '../../../logger'
import {
  BLOCK_STYLES,
  DIVIDER_SPACING,
  ENTRY_SPACING,
  PAGE_MARGINS_INCHES,
  TEXT_BLOCK_KINDS,
  toneColor
} from './block-style'
import { FontService } from './font.service'
import type { DocumentMetadata } from './metadata.util'
import { injectPdfMetadata } from './pdf-metadata.service'

const POINTS_PER_INCH = 72

// left, top, right, bottom
export const PDF_PAGE_MARGINS: [number, number, number, number] = [
  PAGE_MARGINS_INCHES.left * POINTS_PER_INCH,
  PAGE_MARGINS_INCHES.top * POINTS_PER_INCH,
  PAGE_MARGINS_INCHES.right * POINTS_PER_INCH,
  PAGE_MARGINS_INCHES.bottom * POINTS_PER_INCH
]

const PAGE_SIZES: Readonly<Record<PageSize, { name: 'LETTER' | 'A4'; width: number }>> = {
  letter: { name: 'LETTER', width: 612 },
  a4: { name: 'A4', width: 595.28 }
}

function buildStyles(theme: Theme): StyleDictionary {
  const styles: StyleDictionary = {}
  for (const kind of TEXT_BLOCK_KINDS) {
    const style = BLOCK_STYLES[kind]
    styles[kind] = {
      fontSize: style.fontSize,
      bold: style.bold,
      color: toneColor(theme, style.tone),
      alignment: style.alignment,
      margin: [style.indent, style.spaceBefore, 0, style.spaceAfter]
    }
  }
  return styles
}

function spanColor(span: TextSpan, theme: Theme): string | undefined {
  if (span.link) return theme.accentColor
  return span.muted ? theme.secondaryColor : undefined
}

function spanContent(span: TextSpan, theme: Theme): Content {
  return {
    text: span.text,
    bold: span.bold,
    italics: span.italics,
    link: span.link,
    color: spanColor(span, theme)
  }
}

export class PdfMakeService {
  private readonly fonts: FontService

  constructor(
    private readonly log: Logger = rootLogger,
    fonts?: FontService
  ) {
    this.fonts = fonts ?? new FontService({ log })
  }

  /**
   * Lay out a composed résumé as a pdfmake document. The definition references
   * the theme's PDF font family by name; the caller supplies the font files.
   */
  buildDocumentDefinition(
    composed: ComposedResume,
    theme: Theme,
    pageSize: PageSize,
    metadata?: DocumentMetadata
  ): TDocumentDefinitions {
    const page = PAGE_SIZES[pageSize]
    const contentWidth = page.width - PDF_PAGE_MARGINS[0] - PDF_PAGE_MARGINS[2]

    const blockContent = (styled: StyledBlock): Content => {
      if (styled.kind === 'divider') {
        return {
          canvas: [
            {
              type: 'line',
              x1: 0,
              y1: 0,
              x2: contentWidth,
              y2: 0,
              lineWidth: 1,
              lineColor: theme.secondaryColor
            }
          ],
          margin: [0, DIVIDER_SPACING, 0, DIVIDER_SPACING]
        }
      }
      return { text: styled.spans.map((span) => spanContent(span, theme)), style: styled.kind }
    }

    const sectionContent = (section: ComposedSection): Content[] => [
      { text: section.heading, style: 'heading' },
      ...section.entries.map(
        (entry): Content => ({ stack: entry.blocks.map(blockContent), margin: [0, 0, 0, ENTRY_SPACING] })
      )
    ]

    const content: Content[] = [
      ...composed.header.map(blockContent),
      ...composed.sections.flatMap(sectionContent)
    ]

    return {
      pageSize: page.name,
      pageMargins: PDF_PAGE_MARGINS,
      info: metadata
        ? {
            title: metadata.title,
            author: metadata.author,
            subject: metadata.subject,
            keywords: metadata.keywords.join(', ')
          }
        : undefined,
      defaultStyle: {
        font: theme.pdfFont,
        fontSize: BLOCK_STYLES.body.fontSize,
        color: theme.primaryColor
      },
      styles: buildStyles(theme),
      content: content.length > 0 ? content : [{ text: '' }]
    }
  }

  async renderResume(
    composed: ComposedResume,
    theme: Theme,
    pageSize: PageSize,
    metadata: DocumentMetadata
  ): Promise<Buffer> {
    const { faces, embedded } = this.fonts.resolve(theme)
    const printer = new PdfPrinter({ [theme.pdfFont]: faces })
    this.log.debug({ theme: theme.name, font: theme.pdfFont, embedded, pageSize }, 'Rendering PDF résumé')

    const docDefinition = this.buildDocumentDefinition(composed, theme, pageSize, metadata)
    const raw = await this.generatePdfBuffer(printer, docDefinition)
    return injectPdfMetadata(raw, metadata)
  }

  private generatePdfBuffer(printer: PdfPrinter, docDefinition: TDocumentDefinitions): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const handleError = (error: unknown) => {
        this.log.error({ err: error }, 'pdfmake PDF generation failed')
        const message = error instanceof Error ? error.message : 'Unknown error'
        reject(new Error(`PDF generation failed: ${message}`, { cause: error }))
      }

      try {
        const pdfDoc = printer.createPdfKitDocument(docDefinition)
        const chunks: Buffer[] = []

        pdfDoc.on('data', (chunk: Buffer) => {
          chunks.push(chunk)
        })

        pdfDoc.on('end', () => {
          const result = Buffer.concat(chunks)
          this.log.debug({ size: result.length }, 'PDF generated with pdfmake')
          resolve(result)
        })

        pdfDoc.on('error', handleError)

        pdfDoc.end()
      } catch (error) {
        handleError(error)
      }
    })
  }
}
