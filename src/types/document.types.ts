/**
 * Format-neutral output of the section composer. Renderers map each block kind
 * to a paragraph style of their own library.
 */

export type BlockKind =
  | 'name'
  | 'label'
  | 'contact'
  | 'heading'
  | 'title'
  | 'subtitle'
  | 'body'
  | 'bullet'
  | 'divider'

export type BlockAlignment = 'left' | 'center' | 'justify'

/** A run of literal text. Styling lives in the flags, never in the text. */
export interface TextSpan {
  readonly text: string
  readonly bold?: boolean
  readonly italics?: boolean
  readonly link?: string
  /** Rendered in the theme's secondary colour. */
  readonly muted?: boolean
}

export interface StyledBlock {
  readonly kind: BlockKind
  readonly spans: readonly TextSpan[]
}

export type SectionId =
  | 'work'
  | 'education'
  | 'skills'
  | 'projects'
  | 'certificates'
  | 'awards'
  | 'publications'
  | 'volunteer'
  | 'languages'
  | 'interests'
  | 'references'

export interface ComposedEntry {
  readonly blocks: readonly StyledBlock[]
}

export interface ComposedSection {
  readonly id: SectionId
  readonly heading: string
  readonly entries: readonly ComposedEntry[]
}

export interface ComposedResume {
  readonly header: readonly StyledBlock[]
  readonly sections: readonly ComposedSection[]
}
