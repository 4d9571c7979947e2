/**
 * Collapse whitespace runs and trim. Blank input becomes ''.
 */
export function cleanText(value?: string | null): string {
  if (!value) return ''
  return value.replace(/\s+/g, ' ').trim()
}

export const cleanArray = (items?: readonly string[] | null): string[] =>
  (items ?? []).map((item) => cleanText(item)).filter((item) => item !== '')

/** Join the non-blank parts with `separator`. */
export function joinPresent(parts: ReadonlyArray<string | undefined>, separator: string): string {
  return parts.map((part) => cleanText(part)).filter((part) => part !== '').join(separator)
}
