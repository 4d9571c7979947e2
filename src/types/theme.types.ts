export type ThemeName = 'professional' | 'modern' | 'elegant' | 'minimal'

/** Font faces the PDF renderer knows how to locate on the host. */
export type PdfFontFamily = 'LiberationSans' | 'LiberationSerif'

export interface Theme {
  readonly name: ThemeName
  readonly description: string
  /** Hex colours, `#rrggbb`. */
  readonly primaryColor: string
  readonly secondaryColor: string
  readonly accentColor: string
  /** Font family requested from the word processor. */
  readonly fontFamily: string
  readonly pdfFont: PdfFontFamily
  readonly pdfBoldFont: `${PdfFontFamily}-Bold`
}

export type PageSize = 'letter' | 'a4'

export type OutputFormat = 'pdf' | 'docx'
