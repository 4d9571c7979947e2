import path from 'node:path'
import { parseArgs } from 'node:util'
import type { OutputFormat, PageSize } from '../types/theme.types'
import { createGenerator, GenerationError, inferFormat } from '../modules/generator/generator.service'
import { DEFAULT_THEME, THEME_NAMES, themeFor } from '../modules/generator/themes/theme.registry'
import { isUrl, loadResumeSource } from '../modules/resume/resume.loader'
import { safeParseResume, summarizeSections } from '../modules/resume/resume.validator'
import type { ValidationIssue } from '../modules/resume/resume.validator'
import { PROGRAM_NAME, VERSION } from '../version'

export interface CliIO {
  stdout: (line: string) => void
  stderr: (line: string) => void
}

const processIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`)
}

const FORMATS: readonly OutputFormat[] = ['pdf', 'docx']
const PAGE_SIZES: readonly PageSize[] = ['letter', 'a4']

const SCHEMA_URL = 'https://jsonresume.org/schema'

const SCHEMA_SECTIONS: ReadonlyArray<[string, string]> = [
  ['basics', 'Name, contact info, summary, and social profiles'],
  ['work', 'Work experience history'],
  ['volunteer', 'Volunteer experience'],
  ['education', 'Educational background'],
  ['awards', 'Awards and honors'],
  ['certificates', 'Professional certifications'],
  ['publications', 'Published works'],
  ['skills', 'Technical and professional skills'],
  ['languages', 'Language proficiencies'],
  ['interests', 'Personal interests'],
  ['references', 'Professional references'],
  ['projects', 'Personal or professional projects']
]

const MAIN_HELP = `Usage: ${PROGRAM_NAME} [options] <command> [args]

Convert a JSON Resume document to native PDF or DOCX.

Options:
  -V, --version  Show the version and exit.
  -h, --help     Show this message and exit.

Commands:
  convert   Convert a JSON Resume file to PDF or DOCX.
  schema    Show JSON Resume schema information.
  styles    List available resume styles.
  validate  Validate a JSON Resume file.`

const CONVERT_HELP = `Usage: ${PROGRAM_NAME} convert [options] <input> <output>

  <input>   Path to a JSON Resume file or an http(s) URL.
  <output>  Path for the generated document.

Options:
  -f, --format [pdf|docx]              Output format. Inferred from the output
                                       file extension when omitted.
  -s, --style [${THEME_NAMES.join('|')}]
                                       Resume style (default: ${DEFAULT_THEME}).
  -p, --page-size [letter|a4]          Page size (default: letter).
  -h, --help                           Show this message and exit.`

const VALIDATE_HELP = `Usage: ${PROGRAM_NAME} validate <input>

  <input>  Path to a JSON Resume file or an http(s) URL.`

class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function choice<T extends string>(option: string, value: string, allowed: readonly T[]): T {
  const normalized = value.trim().toLowerCase()
  const match = allowed.find((candidate) => candidate === normalized)
  if (!match) {
    const options = allowed.map((candidate) => `'${candidate}'`).join(', ')
    throw new UsageError(`Invalid value for '${option}': '${value}' is not one of ${options}.`)
  }
  return match
}

function printIssues(io: CliIO, issues: readonly ValidationIssue[]) {
  for (const issue of issues) {
    io.stderr(`  - ${issue.path}: ${issue.message}`)
  }
}

async function readSource(source: string, io: CliIO): Promise<unknown> {
  if (isUrl(source)) io.stdout('Fetching resume from URL...')
  return loadResumeSource(source)
}

async function convertCommand(args: readonly string[], io: CliIO): Promise<number> {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: {
      format: { type: 'string', short: 'f' },
      style: { type: 'string', short: 's', default: DEFAULT_THEME },
      'page-size': { type: 'string', short: 'p', default: 'letter' },
      help: { type: 'boolean', short: 'h' }
    }
  })
  if (values.help) {
    io.stdout(CONVERT_HELP)
    return 0
  }
  if (positionals.length !== 2) {
    throw new UsageError('convert expects <input> and <output>')
  }
  const [input, output] = positionals

  const style = choice('--style', values.style ?? DEFAULT_THEME, THEME_NAMES)
  const pageSize = choice('--page-size', values['page-size'] ?? 'letter', PAGE_SIZES)
  const format = values.format ? choice('--format', values.format, FORMATS) : inferFormat(output)
  if (!format) {
    const suffix = path.extname(output).toLowerCase()
    throw new UsageError(`Cannot determine output format from extension '${suffix}'. Use --format to specify.`)
  }

  const parsed = safeParseResume(await readSource(input, io))
  if (!parsed.success) {
    io.stderr('Error: Invalid JSON Resume format:')
    printIssues(io, parsed.issues)
    return 1
  }

  await createGenerator(format).generate(output, parsed.resume, style, pageSize)
  io.stdout(`Successfully generated ${output}`)
  return 0
}

async function validateCommand(args: readonly string[], io: CliIO): Promise<number> {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: { help: { type: 'boolean', short: 'h' } }
  })
  if (values.help) {
    io.stdout(VALIDATE_HELP)
    return 0
  }
  if (positionals.length !== 1) {
    throw new UsageError('validate expects <input>')
  }
  const [input] = positionals

  const parsed = safeParseResume(await readSource(input, io))
  if (!parsed.success) {
    io.stderr('Invalid JSON Resume format:')
    printIssues(io, parsed.issues)
    return 1
  }

  io.stdout(`Valid JSON Resume: ${input}`)
  const sections = summarizeSections(parsed.resume)
  if (sections.length > 0) {
    io.stdout('')
    io.stdout('Sections found:')
    for (const section of sections) io.stdout(`  - ${section}`)
  }
  return 0
}

function stylesCommand(io: CliIO): number {
  io.stdout('Available styles:')
  io.stdout('')
  for (const name of THEME_NAMES) {
    io.stdout(`  ${name.padEnd(15)} - ${themeFor(name).description}`)
  }
  return 0
}

function schemaCommand(io: CliIO): number {
  io.stdout('JSON Resume Schema')
  io.stdout('='.repeat(50))
  io.stdout('')
  io.stdout('For full schema documentation, visit:')
  io.stdout(`  ${SCHEMA_URL}`)
  io.stdout('')
  io.stdout('Supported sections:')
  for (const [name, description] of SCHEMA_SECTIONS) {
    io.stdout(`  ${name.padEnd(15)} - ${description}`)
  }
  return 0
}

async function dispatch(argv: readonly string[], io: CliIO): Promise<number> {
  const command: string | undefined = argv[0]
  const rest = argv.slice(1)
  switch (command) {
    case undefined:
    case '-h':
    case '--help':
      io.stdout(MAIN_HELP)
      return 0
    case '-V':
    case '--version':
      io.stdout(`${PROGRAM_NAME}, version ${VERSION}`)
      return 0
    case 'convert':
      return convertCommand(rest, io)
    case 'validate':
      return validateCommand(rest, io)
    case 'styles':
      return stylesCommand(io)
    case 'schema':
      return schemaCommand(io)
    default:
      throw new UsageError(`No such command '${command}'.`)
  }
}

/**
 * Run the command line and resolve to the process exit code. Results go to
 * `io.stdout`, diagnostics to `io.stderr`.
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  try {
    return await dispatch(argv, io)
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`Error: ${error.message}`)
      io.stderr(`Try '${PROGRAM_NAME} --help' for help.`)
      return 1
    }
    if (error instanceof GenerationError) {
      io.stderr(error.message)
      return 1
    }
    const message = error instanceof Error ? error.message : String(error)
    io.stderr(`Error: ${message}`)
    return 1
  }
}
