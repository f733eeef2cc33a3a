import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { setLogLevel } from '../logger'
import { container } from '../script/container'
import { emphasisSpan, inlineSpan, normalSpan } from '../script/span'
import { ContainerKind, Script } from '../script/types'
import { containerToMarkdown, scriptToMarkdown, spanToMarkdown } from './markdownExporter'

const mixed = (kind: ContainerKind) =>
  container(kind, [normalSpan('some text'), inlineSpan('loudly'), emphasisSpan('EMPHASIS')])

const GUIDE = [
  '## Formatting guide',
  '**spoken text**',
  '**/emphasis/**',
  '*(tone cue, suggested)*',
  '> *[stage direction and/or sfx]*',
  '> *« example listener dialogue, not intended to be voiced »*',
  '--8<--'
]

describe('spanToMarkdown', () => {
  it('renders each span kind', () => {
    expect(spanToMarkdown(normalSpan('Some normal text'))).toBe('Some normal text')
    expect(spanToMarkdown(emphasisSpan('impact'))).toBe('/impact/')
    expect(spanToMarkdown(inlineSpan('an inline'))).toBe('*(an inline)*')
  })
})

describe('containerToMarkdown', () => {
  beforeEach(() => setLogLevel('info'))
  afterEach(() => vi.restoreAllMocks())

  it('joins plain text without wrapping', () => {
    expect(containerToMarkdown(mixed('plainText'))).toBe('some text *(loudly)* /EMPHASIS/')
  })

  it('suppresses inline asterisks inside wrapped blocks', () => {
    expect(containerToMarkdown(mixed('stageDir'))).toBe('> *[some text (loudly) /EMPHASIS/]*')
    expect(containerToMarkdown(mixed('sfx'))).toBe('> *[sfx: some text (loudly) /EMPHASIS/]*')
    expect(containerToMarkdown(mixed('listenerDialogue'))).toBe('> *« some text (loudly) /EMPHASIS/ »*')
  })

  it('bolds spoken text but not cues', () => {
    const line = container('spoken', [inlineSpan('quietly'), normalSpan('hi')])
    expect(containerToMarkdown(line)).toBe('*(quietly)* **hi**')
  })

  it('bolds emphasis in spoken lines and reports the ambiguity', () => {
    const report = vi.fn()
    const line = container('spoken', [
      inlineSpan('quietly, slowly'),
      normalSpan('some text'),
      inlineSpan('loudly'),
      emphasisSpan('EMPHASIS'),
      normalSpan('...hm?')
    ])
    expect(containerToMarkdown(line, { onAmbiguousEmphasis: report })).toBe(
      '*(quietly, slowly)* **some text** *(loudly)* **/EMPHASIS/** **...hm?**'
    )
    expect(report).toHaveBeenCalledTimes(1)
    expect(report).toHaveBeenCalledWith('/EMPHASIS/', 'quietly, slowly some text loudly EMPHASIS ...hm?')
  })

  it('logs a warning for spoken emphasis by default', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    containerToMarkdown(container('spoken', [emphasisSpan('now')]))
    expect(spy).toHaveBeenCalledTimes(1)
  })

  it('collapses whitespace inside spans', () => {
    expect(containerToMarkdown(container('plainText', [normalSpan('  a   b '), normalSpan('c')]))).toBe('a b c')
    expect(containerToMarkdown(container('plainText', [normalSpan('x\u00A0\u00A0y')]))).toBe('x\u00A0\u00A0y')
  })
})

describe('scriptToMarkdown', () => {
  const script: Script = {
    title: 'T',
    author: 'A',
    series: {},
    tags: [],
    summary: 'S',
    characters: [
      { name: 'Mina', description: 'a night nurse' },
      { name: 'Listener', description: 'a patient' }
    ],
    paragraphs: [
      container('stageDir', [normalSpan('A hallway.')]),
      container('spoken', [inlineSpan('whispering'), normalSpan('Still up?')])
    ]
  }

  it('renders characters, the guide and every paragraph', () => {
    expect(scriptToMarkdown(script)).toBe(
      [
        '## Characters',
        '- **Mina** ∼ a night nurse',
        '- **Listener** ∼ a patient',
        ...GUIDE,
        '> *[A hallway.]*',
        '*(whispering)* **Still up?**'
      ].join('\n\n')
    )
  })

  it('does not warn about the guide', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    scriptToMarkdown({ ...script, paragraphs: [] })
    expect(spy).not.toHaveBeenCalled()
  })
})
