import { describe, expect, it } from 'vitest'
import { formatSeriesEntry, parseSeriesEntry } from './series'

describe('series entries', () => {
  it('extracts the title and part', () => {
    expect(parseSeriesEntry('A Very Cool Series (Part 7)')).toEqual({ title: 'A Very Cool Series', part: 7 })
  })

  it('treats placeholders as standalone', () => {
    expect(parseSeriesEntry('')).toEqual({})
    expect(parseSeriesEntry('—')).toEqual({})
    expect(parseSeriesEntry(String.raw`\textemdash`)).toEqual({})
  })

  it('ignores a title without a part suffix', () => {
    expect(parseSeriesEntry('A Very Cool Series')).toEqual({})
  })

  it('formats only complete entries', () => {
    expect(formatSeriesEntry({ title: 'A Very Cool Series', part: 7 })).toBe('A Very Cool Series (Part 7)')
    expect(formatSeriesEntry({})).toBe('')
  })
})
