import { SeriesEntry } from './types'

const PLACEHOLDERS = new Set(['', '—', '\\textemdash'])

const SERIES_PATTERN = /^(.*?) \(Part (\d+)\)$/

export const EMPTY_SERIES: SeriesEntry = Object.freeze({})

/**
 * Parses `"Some Series (Part 3)"`. A placeholder dash, an empty value, or text
 * without the `(Part N)` suffix gives an empty entry.
 */
export function parseSeriesEntry(value: string): SeriesEntry {
  if (PLACEHOLDERS.has(value)) return EMPTY_SERIES
  const m = value.match(SERIES_PATTERN)
  if (!m) return EMPTY_SERIES
  const part = Number.parseInt(m[2], 10)
  return { title: m[1], part: Number.isSafeInteger(part) ? part : 0 }
}

export function formatSeriesEntry(series: SeriesEntry): string {
  if (series.title === undefined || series.part === undefined) return ''
  return `${series.title} (Part ${series.part})`
}
