import type { Resume } from '../../../types/resume.types'
import { cleanArray, cleanText } from './text.util'

export interface DocumentMetadata {
  title: string
  author?: string
  subject?: string
  keywords: string[]
}

const MAX_KEYWORDS = 20

export function documentMetadataFor(resume: Resume): DocumentMetadata {
  const name = cleanText(resume.basics?.name)
  const label = cleanText(resume.basics?.label)
  return {
    title: name ? `${name} - Resume` : 'Resume',
    author: name || undefined,
    subject: label || undefined,
    keywords: resume.skills.flatMap((skill) => cleanArray(skill.keywords)).slice(0, MAX_KEYWORDS)
  }
}
