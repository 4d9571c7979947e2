const MONTH_NAMES = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'
]

const PARTIAL_DATE = /^(\d{4})-(\d{1,2})(?:-\d{1,2})?$/

/**
 * Format a partial ISO date ("2025-02", "2025-02-15") as "Feb 2025".
 * Anything else, including a bare year or an out-of-range month, is returned as given.
 */
export function formatDate(raw: string): string {
  const match = PARTIAL_DATE.exec(raw)
  if (!match) return raw
  const monthIdx = parseInt(match[2], 10) - 1
  if (monthIdx < 0 || monthIdx >= MONTH_NAMES.length) return raw
  return `${MONTH_NAMES[monthIdx]} ${match[1]}`
}

export function formatDateRange(start?: string, end?: string): string {
  if (start && end) return `${formatDate(start)} - ${formatDate(end)}`
  if (start) return `${formatDate(start)} - Present`
  if (end) return `Until ${formatDate(end)}`
  return ''
}
