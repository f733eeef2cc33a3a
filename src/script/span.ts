import { ContainerKind, Span, SpanKind } from './types'

// Latin letters incl. the Latin-1 supplement; apostrophe, tilde and hyphen stay inside a word.
// Other scripts are not counted at all.
const WORD_PATTERN = /[A-Za-zÀ-ÖØ-öø-ÿ'~-]+/g

export const span = (kind: SpanKind, contents: string): Span => ({ kind, contents })

export const normalSpan = (contents: string) => span('normal', contents)

export const emphasisSpan = (contents: string) => span('emphasis', contents)

export const inlineSpan = (contents: string) => span('inlineDirection', contents)

export function countWords(text: string): number {
  return text.match(WORD_PATTERN)?.length ?? 0
}

/** Inline directions are never voiced; everything outside a spoken container is unspoken. */
export function isSpoken(s: Span, context: ContainerKind): boolean {
  if (context !== 'spoken') return false
  return s.kind !== 'inlineDirection'
}
