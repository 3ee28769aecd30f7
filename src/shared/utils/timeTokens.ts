/**
 * Time token substitution for save paths and filename patterns.
 *
 * Supported forms:
 * - {timestamp} {date} {time} {unix}
 * - [time(%Y-%m-%d)]        strftime directives, as used by WAS "Image Save" paths
 * - %date:yyyy-MM-dd%       date pattern, as used by SaveImage filename_prefix
 *
 * Anything else, including unknown {names}, is returned verbatim so literal
 * braces survive in filenames.
 */

import { format, getDayOfYear } from 'date-fns'

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd_HHmmss'

const BRACE_TOKENS: ReadonlyMap<string, (now: Date) => string> = new Map([
  ['timestamp', (now: Date) => format(now, TIMESTAMP_FORMAT)],
  ['date', (now: Date) => format(now, 'yyyy-MM-dd')],
  ['time', (now: Date) => format(now, 'HHmmss')],
  ['unix', (now: Date) => String(Math.floor(now.getTime() / 1000))],
])

// strftime directive -> date-fns pattern
const STRFTIME_DIRECTIVES: ReadonlyMap<string, string> = new Map([
  ['Y', 'yyyy'],
  ['y', 'yy'],
  ['m', 'MM'],
  ['d', 'dd'],
  ['H', 'HH'],
  ['I', 'hh'],
  ['M', 'mm'],
  ['S', 'ss'],
  ['p', 'a'],
  ['b', 'MMM'],
  ['B', 'MMMM'],
  ['a', 'EEE'],
  ['A', 'EEEE'],
])

function formatStrftime(pattern: string, now: Date): string {
  return pattern.replace(/%([a-zA-Z%])/g, (match, directive: string) => {
    if (directive === '%') return '%'
    // date-fns warns on day-of-year tokens
    if (directive === 'j') return String(getDayOfYear(now)).padStart(3, '0')
    const mapped = STRFTIME_DIRECTIVES.get(directive)
    return mapped ? format(now, mapped) : match
  })
}

export function substituteTokens(pathTemplate: string, now: Date = new Date()): string {
  return pathTemplate
    .replace(/\[time\(([^)]+)\)\]/g, (_match, pattern: string) => formatStrftime(pattern, now))
    .replace(/%date:([^%]+)%/g, (match, pattern: string) => {
      try {
        return format(now, pattern)
      } catch (error) {
        console.warn(`⚠️ [timeTokens] Failed to format date with pattern "${pattern}": ${error}`)
        return match
      }
    })
    .replace(/\{([a-zA-Z_]+)\}/g, (match, name: string) => {
      const token = BRACE_TOKENS.get(name)
      return token ? token(now) : match
    })
}
