import type { ZodIssue } from 'zod'
import { resumeSchema } from '../../schemas/resume.schema'
import type { Resume, ResumeListSection } from '../../types/resume.types'

export interface ValidationIssue {
  path: string
  message: string
}

export class ResumeValidationError extends Error {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[], message = 'Invalid JSON Resume format') {
    super(message)
    this.name = 'ResumeValidationError'
    this.issues = issues
  }
}

export type ResumeParseResult =
  | { success: true; resume: Resume }
  | { success: false; issues: ValidationIssue[] }

const toIssue = (issue: ZodIssue): ValidationIssue => ({
  path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
  message: issue.message
})

export function safeParseResume(data: unknown): ResumeParseResult {
  const result = resumeSchema.safeParse(data)
  if (result.success) {
    return { success: true, resume: result.data }
  }
  return { success: false, issues: result.error.issues.map(toIssue) }
}

export function parseResume(data: unknown): Resume {
  const result = safeParseResume(data)
  if (!result.success) {
    throw new ResumeValidationError(result.issues)
  }
  return result.resume
}

const LIST_SECTIONS: readonly ResumeListSection[] = [
  'work',
  'education',
  'skills',
  'projects',
  'certificates',
  'awards',
  'publications',
  'volunteer',
  'languages',
  'interests',
  'references'
]

/**
 * Sections present in the résumé, e.g. `["basics", "work (2 entries)"]`.
 */
export function summarizeSections(resume: Resume): string[] {
  const found: string[] = []
  if (resume.basics) found.push('basics')
  for (const section of LIST_SECTIONS) {
    const count = resume[section].length
    if (count > 0) found.push(`${section} (${count} entries)`)
  }
  return found
}
