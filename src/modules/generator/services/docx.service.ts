import {
  AlignmentType,
  BorderStyle,
  Document,
  ExternalHyperlink,
  HeadingLevel,
  Packer,
  Paragraph,
  TextRun,
  convertInchesToTwip
} from 'docx'
import type { Logger } from 'pino'
import type { BlockAlignment, ComposedResume, StyledBlock, TextSpan } from '../../../types/document.types'
import type { PageSize, Theme } from '../../../types/theme.types'
import { logger as rootLogger } from '../../../logger'
import { PROGRAM_NAME } from '../../../version'
import { BLOCK_STYLES, DIVIDER_SPACING, ENTRY_SPACING, PAGE_MARGINS_INCHES, toneColor } from './block-style'
import type { BlockStyle } from './block-style'
import type { DocumentMetadata } from './metadata.util'

const TWIPS_PER_POINT = 20

// twips
const PAGE_SIZES: Readonly<Record<PageSize, { width: number; height: number }>> = {
  letter: { width: 12240, height: 15840 },
  a4: { width: 11906, height: 16838 }
}

type DocxAlignment = (typeof AlignmentType)[keyof typeof AlignmentType]

const ALIGNMENTS: Readonly<Record<BlockAlignment, DocxAlignment>> = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  justify: AlignmentType.JUSTIFIED
}

// docx wants bare hex
const hex = (color: string): string => color.replace(/^#/, '')

const halfPoints = (points: number): number => points * 2

function runColor(span: TextSpan, theme: Theme, style: BlockStyle): string {
  if (span.link) return theme.accentColor
  return span.muted ? theme.secondaryColor : toneColor(theme, style.tone)
}

function textRun(span: TextSpan, theme: Theme, style: BlockStyle): TextRun {
  return new TextRun({
    text: span.text,
    font: theme.fontFamily,
    size: halfPoints(style.fontSize),
    bold: style.bold || Boolean(span.bold),
    italics: span.italics,
    color: hex(runColor(span, theme, style))
  })
}

function spanChild(span: TextSpan, theme: Theme, style: BlockStyle): TextRun | ExternalHyperlink {
  const run = textRun(span, theme, style)
  return span.link ? new ExternalHyperlink({ children: [run], link: span.link }) : run
}

function divider(theme: Theme): Paragraph {
  return new Paragraph({
    children: [],
    spacing: { before: 0, after: DIVIDER_SPACING * TWIPS_PER_POINT },
    border: {
      bottom: { style: BorderStyle.SINGLE, size: 6, space: 1, color: hex(theme.secondaryColor) }
    }
  })
}

function blockParagraph(styled: StyledBlock, theme: Theme, extraAfter = 0): Paragraph {
  if (styled.kind === 'divider') return divider(theme)
  const style = BLOCK_STYLES[styled.kind]
  return new Paragraph({
    children: styled.spans.map((span) => spanChild(span, theme, style)),
    alignment: ALIGNMENTS[style.alignment],
    heading: styled.kind === 'heading' ? HeadingLevel.HEADING_2 : undefined,
    spacing: {
      before: style.spaceBefore * TWIPS_PER_POINT,
      after: (style.spaceAfter + extraAfter) * TWIPS_PER_POINT
    },
    indent: style.indent > 0 ? { left: style.indent * TWIPS_PER_POINT } : undefined
  })
}

function entryParagraphs(blocks: readonly StyledBlock[], theme: Theme): Paragraph[] {
  if (blocks.length === 0) {
    return [new Paragraph({ children: [], spacing: { after: ENTRY_SPACING * TWIPS_PER_POINT } })]
  }
  return blocks.map((styled, index) =>
    blockParagraph(styled, theme, index === blocks.length - 1 ? ENTRY_SPACING : 0)
  )
}

export class DocxService {
  constructor(private readonly log: Logger = rootLogger) {}

  buildDocument(composed: ComposedResume, theme: Theme, pageSize: PageSize, metadata?: DocumentMetadata): Document {
    const children: Paragraph[] = [
      ...composed.header.map((styled) => blockParagraph(styled, theme)),
      ...composed.sections.flatMap((section) => [
        blockParagraph({ kind: 'heading', spans: [{ text: section.heading }] }, theme),
        ...section.entries.flatMap((entry) => entryParagraphs(entry.blocks, theme))
      ])
    ]

    return new Document({
      creator: PROGRAM_NAME,
      title: metadata?.title,
      subject: metadata?.subject,
      description: metadata?.subject ? `Resume - ${metadata.subject}` : undefined,
      keywords: metadata?.keywords.join(', '),
      sections: [
        {
          properties: {
            page: {
              size: PAGE_SIZES[pageSize],
              margin: {
                top: convertInchesToTwip(PAGE_MARGINS_INCHES.top),
                bottom: convertInchesToTwip(PAGE_MARGINS_INCHES.bottom),
                left: convertInchesToTwip(PAGE_MARGINS_INCHES.left),
                right: convertInchesToTwip(PAGE_MARGINS_INCHES.right)
              }
            }
          },
          children
        }
      ]
    })
  }

  async renderResume(
    composed: ComposedResume,
    theme: Theme,
    pageSize: PageSize,
    metadata: DocumentMetadata
  ): Promise<Buffer> {
    this.log.debug({ theme: theme.name, font: theme.fontFamily, pageSize }, 'Rendering DOCX résumé')
    const doc = this.buildDocument(composed, theme, pageSize, metadata)
    const buffer = await Packer.toBuffer(doc)
    return Buffer.from(buffer)
  }
}
