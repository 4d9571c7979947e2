import { normalizeUrl } from './url.util'

// Keyed by lower-cased network name; {username} is substituted URI-encoded
const PROFILE_URL_TEMPLATES: ReadonlyMap<string, string> = new Map(Object.entries({
  github: 'https://github.com/{username}',
  gitlab: 'https://gitlab.com/{username}',
  bitbucket: 'https://bitbucket.org/{username}',
  linkedin: 'https://linkedin.com/in/{username}',
  twitter: 'https://twitter.com/{username}',
  x: 'https://x.com/{username}',
  youtube: 'https://youtube.com/@{username}',
  'google scholar': 'https://scholar.google.com/citations?user={username}',
  orcid: 'https://orcid.org/{username}',
  researchgate: 'https://researchgate.net/profile/{username}',
  stackoverflow: 'https://stackoverflow.com/users/{username}',
  'stack overflow': 'https://stackoverflow.com/users/{username}',
  medium: 'https://medium.com/@{username}',
  'dev.to': 'https://dev.to/{username}',
  kaggle: 'https://kaggle.com/{username}',
  behance: 'https://behance.net/{username}',
  dribbble: 'https://dribbble.com/{username}',
  codepen: 'https://codepen.io/{username}',
  instagram: 'https://instagram.com/{username}',
  facebook: 'https://facebook.com/{username}',
  hackerrank: 'https://hackerrank.com/profile/{username}',
  leetcode: 'https://leetcode.com/u/{username}'
}))

/**
 * Build the canonical profile URL for a known network, or undefined.
 */
export function profileUrlFor(network?: string, username?: string): string | undefined {
  const key = network?.trim().toLowerCase()
  const handle = username?.trim()
  if (!key || !handle) return undefined
  const template = PROFILE_URL_TEMPLATES.get(key)
  if (!template) return undefined
  // handles are often written with the @ these templates already carry
  const bare = template.includes('@{username}') ? handle.replace(/^@/, '') : handle
  return bare ? template.replace('{username}', encodeURIComponent(bare)) : undefined
}

/**
 * Link target for a profile: the explicit URL when given, else one derived from the network.
 */
export function resolveProfileUrl(network?: string, username?: string, explicitUrl?: string): string | undefined {
  const explicit = explicitUrl?.trim()
  if (explicit) return normalizeUrl(explicit)
  return profileUrlFor(network, username)
}
