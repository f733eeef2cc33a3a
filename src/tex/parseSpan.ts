import { UnknownInlineCommandError } from '../errors'
import { normalSpan, span } from '../script/span'
import { Span, SpanKind } from '../script/types'
import { unescapeTex } from './normalize'

const INLINE_COMMAND = /\\(.+)\{(.*)\}/

// the inline grammar is closed: anything else is an error
export const INLINE_KINDS: ReadonlyMap<string, SpanKind> = new Map<string, SpanKind>([
  ['direct', 'inlineDirection'],
  ['ul', 'emphasis']
])

/**
 * Classifies one partitioned fragment. Prose becomes a normal span;
 * `\direct{…}` an inline direction and `\ul{…}` emphasis.
 */
export function parseSpan(fragment: string): Span {
  const m = unescapeTex(fragment).match(INLINE_COMMAND)
  if (!m) return normalSpan(unescapeTex(fragment.trim()))

  const [, command, arg] = m
  const kind = INLINE_KINDS.get(command)
  if (!kind) throw new UnknownInlineCommandError(command, fragment)
  return span(kind, unescapeTex(arg.trim()))
}
