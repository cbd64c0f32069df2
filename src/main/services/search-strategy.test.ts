import { describe, expect, it } from 'vitest'
import { chooseStrategy, tokenize } from './search-strategy'

describe('tokenize', () => {
  it('splits on anything that is not a letter or digit and lowercases', () => {
    expect(tokenize('ACME, Inc.')).toEqual(['acme', 'inc'])
    expect(tokenize('jane.doe@example.com')).toEqual(['jane', 'doe', 'example', 'com'])
  })

  it('keeps non-Latin letters', () => {
    expect(tokenize('Müller GmbH')).toEqual(['müller', 'gmbh'])
  })

  it('returns nothing for punctuation only', () => {
    expect(tokenize('-- !!')).toEqual([])
  })
})

describe('chooseStrategy', () => {
  it('ranks by tokens when the query has terms and two or more characters', () => {
    expect(chooseStrategy('acme')).toBe('token')
    expect(chooseStrategy('  ab  ')).toBe('token')
  })

  it('falls back to similarity for one character', () => {
    expect(chooseStrategy('a')).toBe('fuzzy')
    expect(chooseStrategy('  z ')).toBe('fuzzy')
  })

  it('falls back to similarity when the tokenizer finds no terms', () => {
    expect(chooseStrategy('--')).toBe('fuzzy')
  })
})
