import { containerWordCount } from './container'
import { formatSeriesEntry } from './series'
import { Character, Script, WordCount } from './types'
import { formatWordCount, sumWordCounts } from './wordCount'

export function scriptWordCount(script: Script): WordCount {
  return sumWordCounts(script.paragraphs.map(containerWordCount))
}

export const formatCharacter = (c: Character) => `${c.name} => ${c.description}`

const formatDate = (date?: Date) => (date ? date.toISOString().slice(0, 10) : 'none')

/**
 * Plain-text summary of a parsed script: header fields, word count, then every
 * span tagged with its kind. The first span of a container carries the
 * container kind, the rest are prefixed with `_`.
 */
export function describeScript(script: Script, densityDecimals = 2): string {
  const lines: string[] = [
    `Title: ${script.title}`,
    `Author: ${script.author}`,
    `Series: ${formatSeriesEntry(script.series)}`,
    `Tags: ${script.tags.map((t) => `[${t}]`).join(' ')}`,
    `Date: ${formatDate(script.date)}`,
    `Summary: ${script.summary}`
  ]
  for (const c of script.characters) lines.push(`Character: ${formatCharacter(c)}`)
  lines.push(`Words: ${formatWordCount(scriptWordCount(script), densityDecimals)}`, '')

  for (const container of script.paragraphs) {
    container.spans.forEach((s, i) => {
      const prefix = i === 0 ? container.kind : '_'
      lines.push(`${prefix}::${s.kind}(${JSON.stringify(s.contents)})`)
    })
  }

  return lines.join('\n')
}
