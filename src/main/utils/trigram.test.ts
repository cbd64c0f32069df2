import { describe, expect, it } from 'vitest'
import { trigramSimilarity, trigrams } from './trigram'

describe('trigrams', () => {
  it('pads each word with two leading blanks and one trailing blank', () => {
    expect([...trigrams('ab')]).toEqual(['  a', ' ab', 'ab '])
  })

  it('lowercases and ignores punctuation between words', () => {
    expect(trigrams('A, b')).toEqual(new Set(['  a', ' a ', '  b', ' b ']))
  })

  it('returns an empty set when there are no letters or digits', () => {
    expect(trigrams(' -- ').size).toBe(0)
  })
})

describe('trigramSimilarity', () => {
  it('scores a one-letter typo against the punctuated name', () => {
    // 3 shared grams out of 12 distinct
    expect(trigramSimilarity('Ackme', 'ACME, Inc.')).toBe(0.25)
  })

  it('is 1 for strings that differ only in case', () => {
    expect(trigramSimilarity('Zeta Labs', 'zeta labs')).toBe(1)
  })

  it('is 0 when either side has no grams', () => {
    expect(trigramSimilarity('', 'Acme')).toBe(0)
    expect(trigramSimilarity('Acme', '...')).toBe(0)
  })
})
