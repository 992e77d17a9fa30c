import { describe, expect, it } from 'vitest'
import { checkSubstitution, posCompatible } from '../../../src/lib/classify/substitution'
import { FakeLexicon, FakeRelatedness, FakeTagger } from '../../helpers/fakes'

const edit = (beforeText: string, afterText: string) => ({ beforeText, afterText, pos1: 0, pos2: 0 })

const deps = (relatedness = new FakeRelatedness()) => ({
  lexicon: new FakeLexicon(),
  tagger: new FakeTagger(),
  relatedness,
  minRelatedness: 5,
  relatednessOptions: { mostFrequentSense: false }
})

describe('posCompatible', () => {
  it('same coarse tag, modal with verb, cardinal with noun', () => {
    expect(posCompatible('NN', 'NNS')).toBe(true)
    expect(posCompatible('MD', 'VBZ')).toBe(true)
    expect(posCompatible('CD', 'NNS')).toBe(true)
    expect(posCompatible('JJ', 'NN')).toBe(false)
  })
})

describe('checkSubstitution', () => {
  it('related words above the threshold', async () => {
    const relatedness = new FakeRelatedness({ scores: { 'big#a|large#a': 6 } })
    expect(await checkSubstitution(edit('big', 'large'), deps(relatedness))).toBe('related')
  })

  it('listed synonym wins over the score', async () => {
    const relatedness = new FakeRelatedness({ synonyms: { 'big#a': ['large'] } })
    expect(await checkSubstitution(edit('big', 'large'), deps(relatedness))).toBe('synonym')
  })

  it('weakly related words', async () => {
    const relatedness = new FakeRelatedness({ scores: { 'big#a|large#a': 2 } })
    expect(await checkSubstitution(edit('big', 'large'), deps(relatedness))).toBe('unrelated')
  })

  it('incompatible parts of speech', async () => {
    expect(await checkSubstitution(edit('big', 'run'), deps())).toBe('not_applicable')
  })

  it('multi-word edits do not apply', async () => {
    expect(await checkSubstitution(edit('the cat', 'dog'), deps())).toBe('not_applicable')
  })

  it('unknown word or missing sense is indeterminate', async () => {
    expect(await checkSubstitution(edit('big', 'blorp'), deps())).toBe('indeterminate')
    expect(await checkSubstitution(edit('on', 'in'), deps())).toBe('indeterminate')
  })
})
