import { debug } from '../logger'
import { parseSeriesEntry } from '../script/series'
import { Container, Script } from '../script/types'
import { parseTags, readHeader } from './header'
import { parseContainer } from './parseContainer'

const PAGE_BREAK = '\\clearpage'
const END_OF_DOCUMENT = '\\end{document}'

/** Everything after the first `\clearpage` (or the whole text), minus `\end{document}`. */
export function scriptBody(tex: string): string {
  const at = tex.indexOf(PAGE_BREAK)
  const start = at === -1 ? 0 : at + PAGE_BREAK.length
  return tex.slice(start).replaceAll(END_OF_DOCUMENT, '')
}

/**
 * Builds a script from a full `.tex` document. Any missing header field or
 * unparseable body line aborts the whole parse.
 */
export function parseScript(tex: string): Script {
  const header = readHeader(tex)

  const paragraphs: Container[] = []
  for (const line of scriptBody(tex).split('\n')) {
    if (!line.trim()) continue
    paragraphs.push(parseContainer(line))
  }
  debug(`Parsed ${paragraphs.length} paragraphs for "${header.title}"`)

  // TODO: parse \scriptDate and the character table once the template settles on a format
  return {
    title: header.title,
    author: header.author,
    series: parseSeriesEntry(header.series),
    tags: parseTags(header.tags),
    summary: header.summary,
    characters: [],
    paragraphs
  }
}
