import { describe, expect, it } from 'vitest'
import { container, containerPlainText, pushSpan } from './container'
import { describeScript, scriptWordCount } from './document'
import { inlineSpan, normalSpan } from './span'
import { Script } from './types'

const script: Script = {
  title: 'T',
  author: 'A',
  series: { title: 'S', part: 2 },
  tags: ['a', 'b'],
  summary: 'Sum',
  characters: [{ name: 'Mina', description: 'a night nurse' }],
  paragraphs: [
    container('spoken', [inlineSpan('softly'), normalSpan('Hi there')]),
    container('sfx', [normalSpan('rain')])
  ]
}

describe('containers', () => {
  it('appends spans without changing the original', () => {
    const empty = container('spoken')
    const one = pushSpan(empty, normalSpan('some text'))
    const three = pushSpan(pushSpan(one, inlineSpan('a cue')), normalSpan('more text'))
    expect(empty.spans).toEqual([])
    expect(containerPlainText(three)).toBe('some text a cue more text')
  })
})

describe('script summaries', () => {
  it('sums the word count over every paragraph', () => {
    expect(scriptWordCount(script)).toEqual({ spoken: 2, unspoken: 2 })
  })

  it('describes header fields and spans', () => {
    expect(describeScript(script)).toBe(
      [
        'Title: T',
        'Author: A',
        'Series: S (Part 2)',
        'Tags: [a] [b]',
        'Date: none',
        'Summary: Sum',
        'Character: Mina => a night nurse',
        'Words: 2 spoken + 2 unspoken -> 4 total (ρ = 50.00%)',
        '',
        'spoken::inlineDirection("softly")',
        '_::normal("Hi there")',
        'sfx::normal("rain")'
      ].join('\n')
    )
  })
})
