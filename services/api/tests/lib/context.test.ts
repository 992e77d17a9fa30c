import { describe, expect, it } from 'vitest'
import {
  assertEditsWithinBounds,
  buildEditContext,
  expandEditToWords,
  expandToSentences,
  expandToWord,
  sentenceSpans
} from '../../src/lib/context'
import { MalformedEditError } from '../../src/lib/errors'

describe('context', () => {
  it('expandToWord grows to word boundaries', () => {
    expect(expandToWord('The cat sat', 5, 6)).toEqual({ start: 4, end: 7 })
    expect(expandToWord('The cat sat', 3, 4)).toEqual({ start: 0, end: 7 })
    expect(expandToWord("don't stop", 2, 2)).toEqual({ start: 0, end: 5 })
  })

  it('sentenceSpans finds sentences in order and skips rewritten ones', () => {
    expect(sentenceSpans('One. Two three.', ['One.', 'Two three.'])).toEqual([
      { start: 0, end: 4 },
      { start: 5, end: 15 }
    ])
    expect(sentenceSpans('One. Two.', ['One.', 'Missing.', 'Two.'])).toEqual([
      { start: 0, end: 4 },
      { start: 5, end: 9 }
    ])
  })

  it('expandToSentences covers touched sentences and handles zero-width ranges', () => {
    const spans = [
      { start: 0, end: 4 },
      { start: 5, end: 15 }
    ]
    expect(expandToSentences('One. Two three.', spans, 6, 8)).toEqual({ start: 5, end: 15 })
    expect(expandToSentences('One. Two three.', spans, 2, 7)).toEqual({ start: 0, end: 15 })
    expect(expandToSentences('One. Two three.', spans, 4, 4)).toEqual({ start: 0, end: 4 })
    expect(expandToSentences('abc', [], 1, 2)).toEqual({ start: 0, end: 3 })
  })

  it('expandEditToWords turns diff fragments into whole words', () => {
    const doc = { original: 'I saw teh dog.', modified: 'I saw the dog.' }
    expect(expandEditToWords({ beforeText: 'e', afterText: '', pos1: 7, pos2: 7 }, doc)).toEqual({
      beforeText: 'teh',
      afterText: 'the',
      pos1: 6,
      pos2: 6
    })
    expect(expandEditToWords({ beforeText: '', afterText: 'e', pos1: 9, pos2: 8 }, doc)).toEqual({
      beforeText: 'teh',
      afterText: 'the',
      pos1: 6,
      pos2: 6
    })
  })

  it('buildEditContext derives word and sentence edits', () => {
    const doc = { original: 'One cat. Two dogs.', modified: 'One cat. Two frogs.' }
    const edit = { beforeText: 'd', afterText: 'fr', pos1: 13, pos2: 13 }
    const ctx = buildEditContext(edit, doc, {
      original: sentenceSpans(doc.original, ['One cat.', 'Two dogs.']),
      modified: sentenceSpans(doc.modified, ['One cat.', 'Two frogs.'])
    })
    expect(ctx.chars).toBe(edit)
    expect(ctx.word).toEqual({ beforeText: 'dogs', afterText: 'frogs', pos1: 13, pos2: 13 })
    expect(ctx.sentence).toEqual({ beforeText: 'Two dogs.', afterText: 'Two frogs.', pos1: 9, pos2: 9 })
  })

  it('assertEditsWithinBounds rejects edits that do not fit the documents', () => {
    const doc = { original: 'abc', modified: 'abXc' }
    expect(() => assertEditsWithinBounds([{ beforeText: '', afterText: 'X', pos1: 2, pos2: 2 }], doc)).not.toThrow()
    expect(() => assertEditsWithinBounds([{ beforeText: 'c', afterText: '', pos1: 5, pos2: 0 }], doc)).toThrow(
      MalformedEditError
    )
    expect(() => assertEditsWithinBounds([{ beforeText: 'z', afterText: '', pos1: 0, pos2: 0 }], doc)).toThrow(
      /edit #0 is malformed: beforeText does not match/
    )
    expect(() => assertEditsWithinBounds([{ beforeText: '', afterText: 'X', pos1: -1, pos2: 2 }], doc)).toThrow(
      /non-negative integers/
    )
  })
})
