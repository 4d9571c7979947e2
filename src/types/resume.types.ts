/**
 * JSON Resume data model.
 *
 * Produced by the schema layer (`parseResume`): scalars are absent rather than
 * null and lists are always present, in input order.
 */

export interface Location {
  readonly address?: string
  readonly postalCode?: string
  readonly city?: string
  readonly countryCode?: string
  readonly region?: string
}

export interface Profile {
  readonly network?: string
  readonly username?: string
  readonly url?: string
}

export interface Basics {
  readonly name?: string
  readonly label?: string
  readonly image?: string
  readonly email?: string
  readonly phone?: string
  readonly url?: string
  readonly summary?: string
  readonly location?: Location
  readonly profiles: readonly Profile[]
}

export interface Work {
  readonly name?: string
  readonly position?: string
  readonly url?: string
  readonly startDate?: string
  readonly endDate?: string
  readonly summary?: string
  readonly highlights: readonly string[]
}

export interface Volunteer {
  readonly organization?: string
  readonly position?: string
  readonly url?: string
  readonly startDate?: string
  readonly endDate?: string
  readonly summary?: string
  readonly highlights: readonly string[]
}

export interface Education {
  readonly institution?: string
  readonly url?: string
  readonly area?: string
  readonly studyType?: string
  readonly startDate?: string
  readonly endDate?: string
  readonly score?: string
  readonly courses: readonly string[]
}

export interface Award {
  readonly title?: string
  readonly date?: string
  readonly awarder?: string
  readonly summary?: string
}

export interface Certificate {
  readonly name?: string
  readonly date?: string
  readonly issuer?: string
  readonly url?: string
}

export interface Publication {
  readonly name?: string
  readonly publisher?: string
  readonly releaseDate?: string
  readonly url?: string
  readonly summary?: string
}

export interface Skill {
  readonly name?: string
  readonly level?: string
  readonly keywords: readonly string[]
}

export interface Language {
  readonly language?: string
  readonly fluency?: string
}

export interface Interest {
  readonly name?: string
  readonly keywords: readonly string[]
}

export interface Reference {
  readonly name?: string
  readonly reference?: string
}

export interface Project {
  readonly name?: string
  readonly startDate?: string
  readonly endDate?: string
  readonly description?: string
  readonly highlights: readonly string[]
  readonly url?: string
}

export interface Resume {
  readonly basics?: Basics
  readonly work: readonly Work[]
  readonly volunteer: readonly Volunteer[]
  readonly education: readonly Education[]
  readonly awards: readonly Award[]
  readonly certificates: readonly Certificate[]
  readonly publications: readonly Publication[]
  readonly skills: readonly Skill[]
  readonly languages: readonly Language[]
  readonly interests: readonly Interest[]
  readonly references: readonly Reference[]
  readonly projects: readonly Project[]
}

/** Keys of the list sections, in the order the CLI reports them. */
export type ResumeListSection = Exclude<keyof Resume, 'basics'>
