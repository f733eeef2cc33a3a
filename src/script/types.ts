// Document model for a parsed audio-drama script

export type SpanKind = 'normal' | 'emphasis' | 'inlineDirection'

export interface Span {
  readonly kind: SpanKind
  readonly contents: string
}

export type ContainerKind = 'spoken' | 'stageDir' | 'sfx' | 'listenerDialogue' | 'plainText'

/** One logical line of the script. Span order is source order. */
export interface Container {
  readonly kind: ContainerKind
  readonly spans: readonly Span[]
}

export interface WordCount {
  readonly spoken: number
  readonly unspoken: number
}

/** The series a script belongs to, with its part index. Both are absent for standalone scripts. */
export interface SeriesEntry {
  readonly title?: string
  readonly part?: number
}

export interface Character {
  readonly name: string
  readonly description: string
}

export interface Script {
  // one string even with several authors
  readonly author: string
  readonly title: string
  readonly series: SeriesEntry
  // without the surrounding brackets
  readonly tags: readonly string[]
  // not parsed yet; always undefined
  readonly date?: Date
  readonly summary: string
  // not parsed yet; always empty
  readonly characters: readonly Character[]
  readonly paragraphs: readonly Container[]
}
