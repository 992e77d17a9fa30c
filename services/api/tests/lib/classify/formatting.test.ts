import { describe, expect, it } from 'vitest'
import { isFormatting } from '../../../src/lib/classify/formatting'

describe('isFormatting', () => {
  it('symbol replaced by symbol', () => {
    expect(isFormatting({ beforeText: ';', afterText: ',', pos1: 1, pos2: 1 }, 'a; b', 'a, b')).toBe(true)
    expect(isFormatting({ beforeText: 'a', afterText: 'b', pos1: 0, pos2: 0 }, 'a', 'b')).toBe(false)
  })

  it('deleted comma next to a space', () => {
    expect(isFormatting({ beforeText: ',', afterText: '', pos1: 1, pos2: 1 }, 'a, b', 'a b')).toBe(true)
  })

  it('hyphen removed from inside a word is not formatting', () => {
    expect(isFormatting({ beforeText: '-', afterText: '', pos1: 1, pos2: 1 }, 'e-mail', 'email')).toBe(false)
    expect(isFormatting({ beforeText: '', afterText: '-', pos1: 1, pos2: 1 }, 'email', 'e-mail')).toBe(false)
  })

  it('document edges count as non-letters', () => {
    expect(isFormatting({ beforeText: '', afterText: '"', pos1: 0, pos2: 0 }, 'Hello', '"Hello')).toBe(true)
    expect(isFormatting({ beforeText: '', afterText: '!', pos1: 5, pos2: 5 }, 'Hello', 'Hello!')).toBe(true)
    expect(isFormatting({ beforeText: '.', afterText: '', pos1: 0, pos2: 0 }, '.', '')).toBe(true)
  })
})
