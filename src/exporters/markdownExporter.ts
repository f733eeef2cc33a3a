import { atomicWrite } from '../interfaces/atomicWrite'
import { warn } from '../logger'
import { container, containerPlainText } from '../script/container'
import { emphasisSpan, inlineSpan, normalSpan } from '../script/span'
import { Container, ContainerKind, Script, Span } from '../script/types'

export interface ContainerRenderOptions {
  /**
   * Called for every emphasis span inside a spoken line. Such a span is
   * rendered as spoken, but it may have been meant as part of an inline
   * direction. Defaults to a logged warning.
   */
  onAmbiguousEmphasis?: (markdown: string, context: string) => void
}

const warnAmbiguousEmphasis = (markdown: string, context: string) =>
  warn(
    `The emphasised span "${markdown}" occurs inside a spoken line and has been rendered as spoken, ` +
      `though it may belong to an inline direction. Context: "${context}"`
  )

export function spanToMarkdown(s: Span): string {
  switch (s.kind) {
    case 'normal':
      return s.contents
    case 'emphasis':
      return `/${s.contents}/`
    case 'inlineDirection':
      return `*(${s.contents})*`
  }
}

const stripAsterisks = (s: string) => s.replace(/^\*+|\*+$/g, '')

function spanInContext(s: Span, c: Container, opts: ContainerRenderOptions): string {
  const md = spanToMarkdown(s)
  switch (c.kind) {
    case 'plainText':
      return md
    case 'stageDir':
    case 'sfx':
    case 'listenerDialogue':
      // > *[text (an inline)]* : the outer wrapper already italicises
      return s.kind === 'inlineDirection' ? stripAsterisks(md) : md
    case 'spoken':
      if (s.kind === 'normal') return `**${md}**`
      if (s.kind === 'emphasis') {
        const report = opts.onAmbiguousEmphasis ?? warnAmbiguousEmphasis
        report(md, containerPlainText(c))
        return `**${md}**`
      }
      return md
  }
}

const WRAPPERS: Readonly<Record<ContainerKind, (text: string) => string>> = {
  plainText: (text) => text,
  spoken: (text) => text,
  stageDir: (text) => `> *[${text}]*`,
  sfx: (text) => `> *[sfx: ${text}]*`,
  listenerDialogue: (text) => `> *« ${text} »*`
}

export function containerToMarkdown(c: Container, opts: ContainerRenderOptions = {}): string {
  const joined = c.spans.map((s) => ` ${spanInContext(s, c, opts)} `).join('')
  return WRAPPERS[c.kind](joined.replace(/[ \t\n\v\f\r]+/g, ' ').trim())
}

const DIVIDER = '--8<--'

const FORMATTING_GUIDE: readonly Container[] = [
  container('spoken', [normalSpan('spoken text')]),
  container('spoken', [emphasisSpan('emphasis')]),
  container('spoken', [inlineSpan('tone cue, suggested')]),
  container('stageDir', [normalSpan('stage direction and/or sfx')]),
  container('listenerDialogue', [normalSpan('example listener dialogue, not intended to be voiced')]),
  container('plainText', [normalSpan(DIVIDER)])
]

/**
 * Renders the whole script: a Characters section, the formatting guide, then
 * one block per paragraph, separated by blank lines. Header metadata is not
 * included.
 */
export function scriptToMarkdown(script: Script, opts: ContainerRenderOptions = {}): string {
  const blocks: string[] = ['## Characters']
  for (const character of script.characters) {
    blocks.push(`- **${character.name}** ∼ ${character.description}`)
  }

  blocks.push('## Formatting guide')
  // the guide's own emphasis example is not ambiguous
  for (const example of FORMATTING_GUIDE) blocks.push(containerToMarkdown(example, { onAmbiguousEmphasis: () => {} }))

  for (const paragraph of script.paragraphs) blocks.push(containerToMarkdown(paragraph, opts))

  return blocks.join('\n\n')
}

/** Writes the Markdown rendering of `script` to `filePath`. */
export async function exportMarkdown(filePath: string, script: Script, opts: ContainerRenderOptions = {}) {
  const markdown = scriptToMarkdown(script, opts)
  await atomicWrite(filePath, markdown + '\n')
  return { outPath: filePath, markdown }
}

export default exportMarkdown
