import type {
  Award,
  Basics,
  Certificate,
  Education,
  Interest,
  Language,
  Project,
  Publication,
  Reference,
  Resume,
  Skill,
  Volunteer,
  Work
} from '../../../types/resume.types'
import type {
  BlockKind,
  ComposedEntry,
  ComposedResume,
  ComposedSection,
  SectionId,
  StyledBlock,
  TextSpan
} from '../../../types/document.types'
import { formatDate, formatDateRange } from '../services/date.util'
import { resolveProfileUrl } from '../services/profile-url.util'
import { cleanArray, cleanText, joinPresent } from '../services/text.util'
import { mailtoUrl, normalizeUrl } from '../services/url.util'

export const SECTION_HEADINGS: Readonly<Record<SectionId, string>> = {
  work: 'EXPERIENCE',
  education: 'EDUCATION',
  skills: 'SKILLS',
  projects: 'PROJECTS',
  certificates: 'CERTIFICATES',
  awards: 'AWARDS',
  publications: 'PUBLICATIONS',
  volunteer: 'VOLUNTEER',
  languages: 'LANGUAGES',
  interests: 'INTERESTS',
  references: 'REFERENCES'
}

const SEPARATOR = ' | '

const sameStyle = (a: TextSpan, b: TextSpan): boolean =>
  Boolean(a.bold) === Boolean(b.bold) && Boolean(a.italics) === Boolean(b.italics) && a.link === b.link

// Adjacent runs with identical styling collapse into one; empty runs drop out
function mergeSpans(spans: readonly TextSpan[]): TextSpan[] {
  const merged: TextSpan[] = []
  for (const span of spans) {
    if (!span.text) continue
    const last = merged[merged.length - 1]
    if (last && sameStyle(last, span)) {
      merged[merged.length - 1] = { ...last, text: last.text + span.text }
    } else {
      merged.push(span)
    }
  }
  return merged
}

function block(kind: BlockKind, spans: readonly TextSpan[]): StyledBlock {
  return { kind, spans: mergeSpans(spans) }
}

const plain = (kind: BlockKind, text: string): StyledBlock => block(kind, [{ text }])

const interleave = (parts: readonly TextSpan[], separator: string): TextSpan[] =>
  parts.flatMap((part, index) => (index > 0 ? [{ text: separator }, part] : [part]))

const linkTo = (url?: string): string | undefined => {
  const cleaned = cleanText(url)
  return cleaned ? normalizeUrl(cleaned) : undefined
}

/** Plain text of a block, styling dropped. */
export function blockText(styled: StyledBlock): string {
  return styled.spans.map((span) => span.text).join('')
}

function bullets(items: readonly string[]): StyledBlock[] {
  return cleanArray(items).map((item) => plain('bullet', `• ${item}`))
}

function optionalPlain(kind: BlockKind, value?: string): StyledBlock[] {
  const text = cleanText(value)
  return text ? [plain(kind, text)] : []
}

function dateRangeBlock(start?: string, end?: string): StyledBlock[] {
  return optionalPlain('subtitle', formatDateRange(cleanText(start) || undefined, cleanText(end) || undefined))
}

/** "{issuer} | {date}" style subtitle; either half may be missing. */
function sourceAndDate(source?: string, date?: string): StyledBlock[] {
  const cleanedDate = cleanText(date)
  return optionalPlain('subtitle', joinPresent([source, cleanedDate ? formatDate(cleanedDate) : undefined], SEPARATOR))
}

function composeHeader(basics?: Basics): StyledBlock[] {
  if (!basics) return []
  const blocks: StyledBlock[] = [...optionalPlain('name', basics.name), ...optionalPlain('label', basics.label)]

  const contact: TextSpan[] = []
  const email = cleanText(basics.email)
  if (email) contact.push({ text: email, link: mailtoUrl(email) })
  const phone = cleanText(basics.phone)
  if (phone) contact.push({ text: phone })
  const url = cleanText(basics.url)
  if (url) contact.push({ text: url, link: normalizeUrl(url) })
  const location = basics.location
  const place = location ? joinPresent([location.city, location.region, location.countryCode], ', ') : ''
  if (place) contact.push({ text: place })
  if (contact.length > 0) blocks.push(block('contact', interleave(contact, SEPARATOR)))

  const profiles: TextSpan[] = []
  for (const profile of basics.profiles) {
    const network = cleanText(profile.network)
    const username = cleanText(profile.username)
    const profileUrl = cleanText(profile.url)
    const label = network && username ? `${network}: ${username}` : profileUrl
    if (!label) continue
    profiles.push({ text: label, link: resolveProfileUrl(network, username, profileUrl) })
  }
  if (profiles.length > 0) blocks.push(block('contact', interleave(profiles, SEPARATOR)))

  blocks.push(...optionalPlain('body', basics.summary))

  if (blocks.length === 0) return []
  blocks.push({ kind: 'divider', spans: [] })
  return blocks
}

/** "{position} at {organization}", either half optional. */
function roleTitle(position?: string, organization?: string, url?: string): StyledBlock[] {
  const role = cleanText(position)
  const org = cleanText(organization)
  if (!role && !org) return []
  const spans: TextSpan[] = [{ text: role }]
  if (org) {
    spans.push({ text: role ? ' at ' : 'at ' }, { text: org, link: linkTo(url) })
  }
  return [block('title', spans)]
}

function composeWork(job: Work): ComposedEntry {
  return {
    blocks: [
      ...roleTitle(job.position, job.name, job.url),
      ...dateRangeBlock(job.startDate, job.endDate),
      ...optionalPlain('body', job.summary),
      ...bullets(job.highlights)
    ]
  }
}

function composeVolunteer(role: Volunteer): ComposedEntry {
  return {
    blocks: [
      ...roleTitle(role.position, role.organization, role.url),
      ...dateRangeBlock(role.startDate, role.endDate),
      ...optionalPlain('body', role.summary),
      ...bullets(role.highlights)
    ]
  }
}

function composeEducation(edu: Education): ComposedEntry {
  const blocks: StyledBlock[] = []
  const studyType = cleanText(edu.studyType)
  const area = cleanText(edu.area)
  if (studyType || area) {
    blocks.push(plain('title', joinPresent([studyType, area ? `in ${area}` : undefined], ' ')))
  }

  const institution = cleanText(edu.institution)
  if (institution) {
    const score = cleanText(edu.score)
    const spans: TextSpan[] = [{ text: institution, link: linkTo(edu.url) }]
    if (score) spans.push({ text: `${SEPARATOR}GPA: ${score}` })
    blocks.push(block('subtitle', spans))
  }

  blocks.push(...dateRangeBlock(edu.startDate, edu.endDate))

  const courses = cleanArray(edu.courses)
  if (courses.length > 0) blocks.push(plain('body', `Courses: ${courses.join(', ')}`))
  return { blocks }
}

/** "**name** (level): keywords" on one line; shared by skills and interests. */
function keywordLine(name?: string, keywords: readonly string[] = [], level?: string): StyledBlock[] {
  const title = cleanText(name)
  if (!title) return []
  const spans: TextSpan[] = [{ text: title, bold: true }]
  const qualifier = cleanText(level)
  if (qualifier) spans.push({ text: ` (${qualifier})`, muted: true })
  const words = cleanArray(keywords)
  if (words.length > 0) spans.push({ text: `: ${words.join(', ')}` })
  return [block('body', spans)]
}

function composeSkill(skill: Skill): ComposedEntry {
  return { blocks: keywordLine(skill.name, skill.keywords, skill.level) }
}

function composeInterest(interest: Interest): ComposedEntry {
  return { blocks: keywordLine(interest.name, interest.keywords) }
}

function composeProject(project: Project): ComposedEntry {
  const url = cleanText(project.url)
  return {
    blocks: [
      ...optionalPlain('title', project.name),
      ...dateRangeBlock(project.startDate, project.endDate),
      ...optionalPlain('body', project.description),
      ...bullets(project.highlights),
      ...(url ? [block('subtitle', [{ text: url, link: normalizeUrl(url) }])] : [])
    ]
  }
}

function linkedTitle(name?: string, url?: string): StyledBlock[] {
  const title = cleanText(name)
  return title ? [block('title', [{ text: title, link: linkTo(url) }])] : []
}

function composeCertificate(cert: Certificate): ComposedEntry {
  return { blocks: [...linkedTitle(cert.name, cert.url), ...sourceAndDate(cert.issuer, cert.date)] }
}

function composeAward(award: Award): ComposedEntry {
  return {
    blocks: [
      ...optionalPlain('title', award.title),
      ...sourceAndDate(award.awarder, award.date),
      ...optionalPlain('body', award.summary)
    ]
  }
}

function composePublication(pub: Publication): ComposedEntry {
  return {
    blocks: [
      ...linkedTitle(pub.name, pub.url),
      ...sourceAndDate(pub.publisher, pub.releaseDate),
      ...optionalPlain('body', pub.summary)
    ]
  }
}

// All languages share one line, so the section always has exactly one entry
function composeLanguages(languages: readonly Language[]): ComposedEntry[] {
  const parts = languages.flatMap((lang) => {
    const name = cleanText(lang.language)
    if (!name) return []
    const fluency = cleanText(lang.fluency)
    return [fluency ? `${name} (${fluency})` : name]
  })
  return [{ blocks: parts.length > 0 ? [plain('body', parts.join(', '))] : [] }]
}

function composeReference(ref: Reference): ComposedEntry {
  const quote = cleanText(ref.reference)
  return {
    blocks: [
      ...optionalPlain('title', ref.name),
      ...(quote ? [block('body', [{ text: `"${quote}"`, italics: true }])] : [])
    ]
  }
}

function section<T>(
  id: SectionId,
  items: readonly T[],
  compose: (items: readonly T[]) => ComposedEntry[]
): ComposedSection[] {
  if (items.length === 0) return []
  return [{ id, heading: SECTION_HEADINGS[id], entries: compose(items) }]
}

const each =
  <T>(compose: (item: T) => ComposedEntry) =>
  (items: readonly T[]): ComposedEntry[] =>
    items.map(compose)

/**
 * Lay out a résumé as format-neutral blocks. Sections appear in a fixed order
 * and only when their list is non-empty; entries keep input order.
 */
export function composeResume(resume: Resume): ComposedResume {
  return {
    header: composeHeader(resume.basics),
    sections: [
      ...section('work', resume.work, each(composeWork)),
      ...section('education', resume.education, each(composeEducation)),
      ...section('skills', resume.skills, each(composeSkill)),
      ...section('projects', resume.projects, each(composeProject)),
      ...section('certificates', resume.certificates, each(composeCertificate)),
      ...section('awards', resume.awards, each(composeAward)),
      ...section('publications', resume.publications, each(composePublication)),
      ...section('volunteer', resume.volunteer, each(composeVolunteer)),
      ...section('languages', resume.languages, composeLanguages),
      ...section('interests', resume.interests, each(composeInterest)),
      ...section('references', resume.references, each(composeReference))
    ]
  }
}
