import { WordCount } from './types'

export const ZERO_WORD_COUNT: WordCount = Object.freeze({ spoken: 0, unspoken: 0 })

export const wordCount = (spoken: number, unspoken: number): WordCount => ({ spoken, unspoken })

export const onlySpoken = (words: number): WordCount => wordCount(words, 0)

export const onlyUnspoken = (words: number): WordCount => wordCount(0, words)

export const addWordCounts = (a: WordCount, b: WordCount): WordCount =>
  wordCount(a.spoken + b.spoken, a.unspoken + b.unspoken)

export const sumWordCounts = (counts: Iterable<WordCount>): WordCount => {
  let acc = ZERO_WORD_COUNT
  for (const c of counts) acc = addWordCounts(acc, c)
  return acc
}

export const totalWords = (count: WordCount) => count.spoken + count.unspoken

/** Fraction of words that are spoken. NaN when nothing was counted. */
export const speechDensity = (count: WordCount) => count.spoken / totalWords(count)

const DENSITY_PLACEHOLDER = '———%'

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })

/**
 * Formats a count as `"1,200 spoken + 300 unspoken -> 1,500 total (ρ = 80.00%)"`.
 */
export function formatWordCount(count: WordCount, decimals = 2): string {
  const density = speechDensity(count)
  const rho = Number.isNaN(density) ? DENSITY_PLACEHOLDER : `${(100 * density).toFixed(decimals)}%`
  const spoken = integerFormat.format(count.spoken)
  const unspoken = integerFormat.format(count.unspoken)
  const total = integerFormat.format(totalWords(count))
  return `${spoken} spoken + ${unspoken} unspoken -> ${total} total (ρ = ${rho})`
}
