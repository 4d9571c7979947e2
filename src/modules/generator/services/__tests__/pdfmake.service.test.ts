import { describe, expect, it } from 'vitest'
import { PDFDocument } from 'pdf-lib'
import { PdfMakeService, PDF_PAGE_MARGINS } from '../pdfmake.service'
import { FontService } from '../font.service'
import { documentMetadataFor } from '../metadata.util'
import { composeResume } from '../../composer/section-composer'
import { themeFor } from '../../themes/theme.registry'
import { parseResume } from '../../../resume/resume.validator'
import { emptyResume, fullResume } from '../../__tests__/resume.fixture'

const service = () => new PdfMakeService(undefined, new FontService({ discovery: false }))

const composedFrom = (data: unknown) => composeResume(parseResume(data))

describe('PdfMakeService.buildDocumentDefinition', () => {
  it('uses the page size and margins', () => {
    const letter = service().buildDocumentDefinition(composeResume(emptyResume()), themeFor('professional'), 'letter')
    expect(letter.pageSize).toBe('LETTER')
    expect(letter.pageMargins).toEqual([54, 36, 54, 36])
    expect(PDF_PAGE_MARGINS).toEqual([54, 36, 54, 36])

    const a4 = service().buildDocumentDefinition(composeResume(emptyResume()), themeFor('professional'), 'a4')
    expect(a4.pageSize).toBe('A4')
  })

  it('sets the theme font and text colour', () => {
    const definition = service().buildDocumentDefinition(composeResume(emptyResume()), themeFor('elegant'), 'letter')
    expect(definition.defaultStyle).toEqual({ font: 'LiberationSerif', fontSize: 10, color: '#2d3436' })
  })

  it('derives block styles from the theme', () => {
    const definition = service().buildDocumentDefinition(composeResume(emptyResume()), themeFor('modern'), 'letter')
    expect(definition.styles?.name).toEqual({
      fontSize: 24,
      bold: true,
      color: '#1a1a2e',
      alignment: 'center',
      margin: [0, 0, 0, 4]
    })
    expect(definition.styles?.heading).toMatchObject({ fontSize: 12, bold: true, color: '#e94560' })
    expect(definition.styles?.body).toMatchObject({ alignment: 'justify' })
    expect(definition.styles?.bullet).toMatchObject({ margin: [12, 0, 0, 2] })
  })

  it('emits a blank paragraph for an empty résumé', () => {
    const definition = service().buildDocumentDefinition(composeResume(emptyResume()), themeFor('minimal'), 'letter')
    expect(definition.content).toEqual([{ text: '' }])
  })

  it('draws the header divider across the content width', () => {
    const definition = service().buildDocumentDefinition(
      composedFrom({ basics: { name: 'Jane' } }),
      themeFor('professional'),
      'letter'
    )
    expect(definition.content).toEqual([
      { text: [{ text: 'Jane' }], style: 'name' },
      {
        canvas: [{ type: 'line', x1: 0, y1: 0, x2: 504, y2: 0, lineWidth: 1, lineColor: '#7f8c8d' }],
        margin: [0, 8, 0, 8]
      }
    ])
  })

  it('stacks each entry under its section heading', () => {
    const definition = service().buildDocumentDefinition(
      composedFrom({ work: [{ position: 'Eng', name: 'Acme', url: 'acme.example' }] }),
      themeFor('professional'),
      'letter'
    )
    expect(definition.content).toEqual([
      { text: 'EXPERIENCE', style: 'heading' },
      {
        stack: [
          {
            text: [{ text: 'Eng at ' }, { text: 'Acme', link: 'https://acme.example', color: '#3498db' }],
            style: 'title'
          }
        ],
        margin: [0, 0, 0, 6]
      }
    ])
  })

  it('colours skill levels with the secondary tone', () => {
    const definition = service().buildDocumentDefinition(
      composedFrom({ skills: [{ name: 'Go', level: 'Expert' }] }),
      themeFor('professional'),
      'letter'
    )
    expect(definition.content).toEqual([
      { text: 'SKILLS', style: 'heading' },
      {
        stack: [
          {
            text: [{ text: 'Go', bold: true }, { text: ' (Expert)', color: '#7f8c8d' }],
            style: 'body'
          }
        ],
        margin: [0, 0, 0, 6]
      }
    ])
  })

  it('passes reserved characters through as literal text', () => {
    const definition = service().buildDocumentDefinition(
      composedFrom({ basics: { name: '<b>Jane & "Co"</b>' } }),
      themeFor('professional'),
      'letter'
    )
    expect(definition.content).toContainEqual({ text: [{ text: '<b>Jane & "Co"</b>' }], style: 'name' })
  })

  it('fills the document info from metadata', () => {
    const resume = fullResume()
    const definition = service().buildDocumentDefinition(
      composeResume(resume),
      themeFor('professional'),
      'letter',
      documentMetadataFor(resume)
    )
    expect(definition.info).toEqual({
      title: 'Jane Doe - Resume',
      author: 'Jane Doe',
      subject: 'Platform Engineer',
      keywords: 'TypeScript, Go'
    })
  })
})

describe('PdfMakeService.renderResume', () => {
  it('renders a PDF with metadata', async () => {
    const resume = fullResume()
    const buffer = await service().renderResume(
      composeResume(resume),
      themeFor('professional'),
      'letter',
      documentMetadataFor(resume)
    )

    expect(buffer.subarray(0, 5).toString('latin1')).toBe('%PDF-')
    const pdf = await PDFDocument.load(buffer, { updateMetadata: false })
    expect(pdf.getTitle()).toBe('Jane Doe - Resume')
    expect(pdf.getAuthor()).toBe('Jane Doe')
    expect(pdf.getSubject()).toBe('Platform Engineer')
    expect(pdf.getProducer()).toBe('resume-press')
    expect(pdf.getCreator()).toBe('resume-press')
    expect(pdf.getPage(0).getSize()).toEqual({ width: 612, height: 792 })
  })

  it('renders A4 pages', async () => {
    const resume = fullResume()
    const buffer = await service().renderResume(composeResume(resume), themeFor('elegant'), 'a4', documentMetadataFor(resume))
    const { width, height } = (await PDFDocument.load(buffer)).getPage(0).getSize()
    expect(width).toBeCloseTo(595.28, 1)
    expect(height).toBeCloseTo(841.89, 1)
  })

  it('renders an empty résumé as a single page', async () => {
    const resume = emptyResume()
    const buffer = await service().renderResume(composeResume(resume), themeFor('minimal'), 'letter', documentMetadataFor(resume))
    const pdf = await PDFDocument.load(buffer, { updateMetadata: false })
    expect(pdf.getPageCount()).toBe(1)
    expect(pdf.getTitle()).toBe('Resume')
  })
})
