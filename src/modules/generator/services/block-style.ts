import type { BlockAlignment, BlockKind } from '../../../types/document.types'
import type { Theme } from '../../../types/theme.types'

export type TextTone = 'primary' | 'secondary' | 'accent'

/** Typography for one block kind. Sizes and spacing are in points. */
export interface BlockStyle {
  fontSize: number
  bold: boolean
  tone: TextTone
  alignment: BlockAlignment
  spaceBefore: number
  spaceAfter: number
  indent: number
}

export type TextBlockKind = Exclude<BlockKind, 'divider'>

export const BLOCK_STYLES: Readonly<Record<TextBlockKind, BlockStyle>> = {
  name: { fontSize: 24, bold: true, tone: 'primary', alignment: 'center', spaceBefore: 0, spaceAfter: 4, indent: 0 },
  label: { fontSize: 14, bold: false, tone: 'secondary', alignment: 'center', spaceBefore: 0, spaceAfter: 8, indent: 0 },
  contact: { fontSize: 10, bold: false, tone: 'secondary', alignment: 'center', spaceBefore: 0, spaceAfter: 6, indent: 0 },
  heading: { fontSize: 12, bold: true, tone: 'accent', alignment: 'left', spaceBefore: 12, spaceAfter: 6, indent: 0 },
  title: { fontSize: 11, bold: true, tone: 'primary', alignment: 'left', spaceBefore: 0, spaceAfter: 2, indent: 0 },
  subtitle: { fontSize: 10, bold: false, tone: 'secondary', alignment: 'left', spaceBefore: 0, spaceAfter: 4, indent: 0 },
  body: { fontSize: 10, bold: false, tone: 'primary', alignment: 'justify', spaceBefore: 0, spaceAfter: 6, indent: 0 },
  bullet: { fontSize: 10, bold: false, tone: 'primary', alignment: 'left', spaceBefore: 0, spaceAfter: 2, indent: 12 }
}

export const TEXT_BLOCK_KINDS: readonly TextBlockKind[] = [
  'name',
  'label',
  'contact',
  'heading',
  'title',
  'subtitle',
  'body',
  'bullet'
]

/** Gap after each section entry. */
export const ENTRY_SPACING = 6

/** Vertical space around the rule under the header. */
export const DIVIDER_SPACING = 8

export const PAGE_MARGINS_INCHES = { top: 0.5, bottom: 0.5, left: 0.75, right: 0.75 } as const

export function toneColor(theme: Theme, tone: TextTone): string {
  switch (tone) {
    case 'primary':
      return theme.primaryColor
    case 'secondary':
      return theme.secondaryColor
    case 'accent':
      return theme.accentColor
  }
}
