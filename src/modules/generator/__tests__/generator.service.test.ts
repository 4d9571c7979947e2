import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { decodePDFRawStream, PDFArray, PDFDocument, PDFRawStream } from 'pdf-lib'
import type { PDFObject } from 'pdf-lib'
import JSZip from 'jszip'
import {
  createGenerator,
  DocxResumeGenerator,
  GenerationError,
  inferFormat,
  PdfResumeGenerator
} from '../generator.service'
import type { ResumeRenderer } from '../generator.service'
import { THEME_NAMES } from '../themes/theme.registry'
import { emptyResume, fullResume } from './resume.fixture'

const stubRenderer = (render: () => Promise<Buffer>) => {
  const renderResume = vi.fn<ResumeRenderer['renderResume']>(render)
  return { renderResume }
}

const decodedStream = (stream: PDFObject | undefined): string =>
  stream instanceof PDFRawStream ? Buffer.from(decodePDFRawStream(stream).decode()).toString('latin1') : ''

describe('inferFormat', () => {
  it('maps known extensions ignoring case', () => {
    expect(inferFormat('out/resume.pdf')).toBe('pdf')
    expect(inferFormat('RESUME.PDF')).toBe('pdf')
    expect(inferFormat('resume.Docx')).toBe('docx')
  })

  it('returns undefined otherwise', () => {
    expect(inferFormat('resume.txt')).toBeUndefined()
    expect(inferFormat('resume')).toBeUndefined()
  })
})

describe('createGenerator', () => {
  it('builds a generator per format', () => {
    expect(createGenerator('pdf')).toBeInstanceOf(PdfResumeGenerator)
    expect(createGenerator('pdf').format).toBe('pdf')
    expect(createGenerator('docx')).toBeInstanceOf(DocxResumeGenerator)
    expect(createGenerator('docx').format).toBe('docx')
  })
})

describe('document generators', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'resume-generate-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('writes a PDF into nested directories', async () => {
    const output = path.join(dir, 'a', 'b', 'resume.pdf')
    await createGenerator('pdf').generate(output, fullResume())

    const bytes = await fs.readFile(output)
    expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-')
    const pdf = await PDFDocument.load(bytes, { updateMetadata: false })
    expect(pdf.getTitle()).toBe('Jane Doe - Resume')
    expect(pdf.getPage(0).getSize()).toEqual({ width: 612, height: 792 })
  })

  it('writes a DOCX', async () => {
    const output = path.join(dir, 'resume.docx')
    await createGenerator('docx').generate(output, fullResume(), 'modern', 'a4')

    const zip = await JSZip.loadAsync(await fs.readFile(output))
    expect(zip.file('word/document.xml')).not.toBeNull()
  })

  it.each(THEME_NAMES)('renders the %s style in both formats', async (style) => {
    for (const format of ['pdf', 'docx'] as const) {
      const output = path.join(dir, `${style}.${format}`)
      await createGenerator(format).generate(output, fullResume(), style)
      expect((await fs.stat(output)).size).toBeGreaterThan(0)
    }
  })

  it('renders an empty résumé', async () => {
    await createGenerator('pdf').generate(path.join(dir, 'empty.pdf'), emptyResume())
    await createGenerator('docx').generate(path.join(dir, 'empty.docx'), emptyResume())
    expect((await fs.readdir(dir)).sort()).toEqual(['empty.docx', 'empty.pdf'])
  })

  it('passes the resolved theme and page size to the renderer', async () => {
    const renderer = stubRenderer(async () => Buffer.from('rendered'))
    const output = path.join(dir, 'resume.pdf')

    await new PdfResumeGenerator(renderer).generate(output, fullResume(), ' Modern ', 'a4')

    expect(renderer.renderResume).toHaveBeenCalledTimes(1)
    const [composed, theme, pageSize, metadata] = renderer.renderResume.mock.calls[0]
    expect(composed.header[0]).toEqual({ kind: 'name', spans: [{ text: 'Jane Doe' }] })
    expect(theme.name).toBe('modern')
    expect(pageSize).toBe('a4')
    expect(metadata.title).toBe('Jane Doe - Resume')
    expect(await fs.readFile(output, 'utf-8')).toBe('rendered')
  })

  it('falls back to the default theme and letter pages', async () => {
    const renderer = stubRenderer(async () => Buffer.from('rendered'))
    await new DocxResumeGenerator(renderer).generate(path.join(dir, 'resume.docx'), fullResume(), 'neon')

    const [, theme, pageSize] = renderer.renderResume.mock.calls[0]
    expect(theme.name).toBe('professional')
    expect(pageSize).toBe('letter')
  })

  it('wraps renderer failures and writes nothing', async () => {
    const cause = new Error('boom')
    const output = path.join(dir, 'resume.pdf')
    const generator = new PdfResumeGenerator(stubRenderer(() => Promise.reject(cause)))

    const error = await generator.generate(output, fullResume()).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(GenerationError)
    expect(error).toMatchObject({ message: 'Error generating PDF: boom', format: 'pdf', outputPath: output, cause })
    expect(await fs.readdir(dir)).toEqual([])
  })

  it('wraps write failures without leaving partial files', async () => {
    const output = path.join(dir, 'taken.docx')
    await fs.mkdir(path.join(output, 'child'), { recursive: true })

    await expect(createGenerator('docx').generate(output, fullResume())).rejects.toThrow(GenerationError)
    expect(await fs.readdir(dir)).toEqual(['taken.docx'])
  })

  it('produces the same PDF content on repeated runs', async () => {
    const first = path.join(dir, 'first.pdf')
    const second = path.join(dir, 'second.pdf')
    await createGenerator('pdf').generate(first, fullResume())
    await createGenerator('pdf').generate(second, fullResume())

    const load = async (file: string) => {
      const pdf = await PDFDocument.load(await fs.readFile(file), { updateMetadata: false })
      return {
        pages: pdf.getPages().map((page) => {
          const contents = page.node.Contents()
          const streams = contents instanceof PDFArray ? contents.asArray().map((ref) => pdf.context.lookup(ref)) : [contents]
          return streams.map(decodedStream).join('\n')
        }),
        info: [pdf.getTitle(), pdf.getAuthor(), pdf.getSubject(), pdf.getKeywords(), pdf.getProducer()]
      }
    }
    const [a, b] = await Promise.all([load(first), load(second)])
    expect(b.info).toEqual(a.info)
    expect(a.info).toEqual(['Jane Doe - Resume', 'Jane Doe', 'Platform Engineer', 'TypeScript Go', 'resume-press'])
    expect(a.pages.length).toBeGreaterThan(0)
    expect(a.pages[0]).toContain('BT')
    expect(b.pages).toEqual(a.pages)
  })

  it('produces the same document text on repeated runs', async () => {
    const first = path.join(dir, 'first.docx')
    const second = path.join(dir, 'second.docx')
    await createGenerator('docx').generate(first, fullResume())
    await createGenerator('docx').generate(second, fullResume())

    const texts = async (file: string) => {
      const zip = await JSZip.loadAsync(await fs.readFile(file))
      const xml = (await zip.file('word/document.xml')?.async('string')) ?? ''
      return [...xml.matchAll(/<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g)].map((match) => match[1])
    }
    expect(await texts(second)).toEqual(await texts(first))
  })
})
