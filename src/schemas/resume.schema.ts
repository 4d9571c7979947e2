import { z } from 'zod'
import type { Resume } from '../types/resume.types'

// JSON Resume allows explicit nulls; the model only knows "absent"
const text = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined)

const textList = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? [])

const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((value) => value ?? [])

export const locationSchema = z.object({
  address: text,
  postalCode: text,
  city: text,
  countryCode: text,
  region: text
})

export const profileSchema = z.object({
  network: text,
  username: text,
  url: text
})

export const basicsSchema = z.object({
  name: text,
  label: text,
  image: text,
  email: text,
  phone: text,
  url: text,
  summary: text,
  location: locationSchema.nullish().transform((value) => value ?? undefined),
  profiles: listOf(profileSchema)
})

export const workSchema = z.object({
  name: text,
  position: text,
  url: text,
  startDate: text,
  endDate: text,
  summary: text,
  highlights: textList
})

export const volunteerSchema = z.object({
  organization: text,
  position: text,
  url: text,
  startDate: text,
  endDate: text,
  summary: text,
  highlights: textList
})

export const educationSchema = z.object({
  institution: text,
  url: text,
  area: text,
  studyType: text,
  startDate: text,
  endDate: text,
  score: text,
  courses: textList
})

export const awardSchema = z.object({
  title: text,
  date: text,
  awarder: text,
  summary: text
})

export const certificateSchema = z.object({
  name: text,
  date: text,
  issuer: text,
  url: text
})

export const publicationSchema = z.object({
  name: text,
  publisher: text,
  releaseDate: text,
  url: text,
  summary: text
})

export const skillSchema = z.object({
  name: text,
  level: text,
  keywords: textList
})

export const languageSchema = z.object({
  language: text,
  fluency: text
})

export const interestSchema = z.object({
  name: text,
  keywords: textList
})

export const referenceSchema = z.object({
  name: text,
  reference: text
})

export const projectSchema = z.object({
  name: text,
  startDate: text,
  endDate: text,
  description: text,
  highlights: textList,
  url: text
})

export const resumeSchema: z.ZodType<Resume, z.ZodTypeDef, unknown> = z.object({
  basics: basicsSchema.nullish().transform((value) => value ?? undefined),
  work: listOf(workSchema),
  volunteer: listOf(volunteerSchema),
  education: listOf(educationSchema),
  awards: listOf(awardSchema),
  certificates: listOf(certificateSchema),
  publications: listOf(publicationSchema),
  skills: listOf(skillSchema),
  languages: listOf(languageSchema),
  interests: listOf(interestSchema),
  references: listOf(referenceSchema),
  projects: listOf(projectSchema)
})
