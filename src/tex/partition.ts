// steps over a whole surrogate pair in unicode mode, otherwise the same empty match repeats forever
function advanceIndex(re: RegExp, text: string, index: number) {
  const unicode = re.unicode || re.flags.includes('v')
  const cp = text.codePointAt(index)
  return unicode && cp !== undefined && cp > 0xffff ? index + 2 : index + 1
}

/**
 * Splits `text` around every match of `pattern`, keeping the matches.
 *
 * The result alternates "text before a match" and "the match", followed by
 * whatever is left after the last match (when non-empty). Empty segments are
 * kept, so joining the result always gives back `text`.
 *
 * @example
 * regexPartition(/C+/, 'ABCCQBCPCCC') // ['AB', 'CC', 'QB', 'C', 'P', 'CCC']
 */
export function regexPartition(pattern: RegExp, text: string): string[] {
  // private global copy so the caller's lastIndex is never touched
  const re = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g')
  const segments: string[] = []

  let i = 0
  let m: RegExpExecArray | null
  while ((m = re.exec(text))) {
    segments.push(text.slice(i, m.index), m[0])
    i = m.index + m[0].length
    if (m[0] === '') re.lastIndex = advanceIndex(re, text, re.lastIndex)
  }

  const tail = text.slice(i)
  if (tail) segments.push(tail)
  return segments
}
