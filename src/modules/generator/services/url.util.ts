/** Prefix `https://` unless the value already names http or https. Blank input gives ''. */
export function normalizeUrl(value: string): string {
  const trimmed = value.trim()
  if (!trimmed) return ''
  return /^https?:/i.test(trimmed) ? trimmed : `https://${trimmed}`
}

export function mailtoUrl(email: string): string {
  return `mailto:${email.trim()}`
}
