import { countWords, isSpoken } from './span'
import { Container, ContainerKind, Span, WordCount } from './types'
import { onlySpoken, onlyUnspoken, sumWordCounts } from './wordCount'

export const container = (kind: ContainerKind, spans: readonly Span[] = []): Container => ({ kind, spans })

/** Returns a new container with `s` appended. */
export const pushSpan = (c: Container, s: Span): Container => container(c.kind, [...c.spans, s])

/** Span contents joined by a space, ignoring formatting. */
export const containerPlainText = (c: Container) => c.spans.map((s) => s.contents).join(' ')

export function containerWordCount(c: Container): WordCount {
  return sumWordCounts(
    c.spans.map((s) => {
      const words = countWords(s.contents)
      return isSpoken(s, c.kind) ? onlySpoken(words) : onlyUnspoken(words)
    })
  )
}
