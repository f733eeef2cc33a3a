import { MissingFieldError } from '../errors'

export type HeaderField = 'title' | 'author' | 'series' | 'tags' | 'summary'

export type Header = Record<HeaderField, string>

// the value is the first `{…}` argument after the command
export const HEADER_FIELDS: Readonly<Record<HeaderField, RegExp>> = {
  title: /\\renewcommand\{\\SceneName\}\{(?<value>.*?)\}/,
  author: /\\scriptAuthor\{(?<value>.*?)\}/,
  series: /\\scriptSeries\{(?<value>.*?)\}/,
  tags: /\\scriptTags\{(?<value>.*?)\}/,
  summary: /\\summary\{(?<value>.*?)\}/
}

const escapeReg = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

/** Value of the first `\command{value}` in `text`, or undefined. */
export function searchTex(command: string, text: string): string | undefined {
  const re = new RegExp(`\\\\${escapeReg(command)}\\{(?<value>.*?)\\}`)
  return re.exec(text)?.groups?.value
}

/** Looks up every header field; the first one missing throws. */
export function readHeader(text: string): Header {
  const lookup = (field: HeaderField) => {
    const value = HEADER_FIELDS[field].exec(text)?.groups?.value
    if (value === undefined) throw new MissingFieldError(field)
    return value
  }
  return {
    title: lookup('title'),
    author: lookup('author'),
    series: lookup('series'),
    tags: lookup('tags'),
    summary: lookup('summary')
  }
}

/** `[a][b][c]` → `['a', 'b', 'c']`; order and duplicates are kept. */
export function parseTags(value: string): string[] {
  return Array.from(value.matchAll(/\[(.*?)\]/g), (m) => m[1])
}
