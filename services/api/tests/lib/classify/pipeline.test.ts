import { describe, expect, it, vi } from 'vitest'
import pino from 'pino'
import { ClassificationPipeline, summarizeRecords } from '../../../src/lib/classify/pipeline'
import { DEFAULT_CLASSIFIER_CONFIG } from '../../../src/lib/config'
import { MalformedEditError } from '../../../src/lib/errors'
import { FakeGrammar, FakeRelatedness, makeServices, violation } from '../../helpers/fakes'

const quietLogger = () => pino({ level: 'silent' })

describe('ClassificationPipeline', () => {
  it('citation short-circuits every later stage', async () => {
    const services = makeServices()
    const synonyms = vi.spyOn(services.relatedness, 'synonyms')
    const matrix = vi.spyOn(services.relatedness, 'relatednessMatrix')
    const check = vi.spyOn(services.grammar, 'check')
    const pipeline = new ClassificationPipeline(services, DEFAULT_CLASSIFIER_CONFIG, quietLogger())

    const doc = { original: 'He said "old quote" today.', modified: 'He said "new quote" today.' }
    const records = await pipeline.classify([{ beforeText: '"old quote"', afterText: '"new quote"', pos1: 8, pos2: 8 }], doc)

    expect(records).toEqual([
      {
        index: 0,
        edit: { beforeText: '"old quote"', afterText: '"new quote"', pos1: 8, pos2: 8 },
        category: 'citation',
        decidedBy: 'citation'
      }
    ])
    expect(synonyms).not.toHaveBeenCalled()
    expect(matrix).not.toHaveBeenCalled()
    expect(check).not.toHaveBeenCalled()
  })

  it('spelling fix and indeterminate spelling both stop the chain', async () => {
    const services = makeServices()
    const check = vi.spyOn(services.grammar, 'check')
    const pipeline = new ClassificationPipeline(services, DEFAULT_CLASSIFIER_CONFIG, quietLogger())

    const fixed = await pipeline.classify([{ beforeText: 'teh', afterText: 'the', pos1: 6, pos2: 6 }], {
      original: 'I saw teh dog.',
      modified: 'I saw the dog.'
    })
    expect(fixed[0]).toMatchObject({ category: 'spelling', decidedBy: 'spelling' })

    const unknown = await pipeline.classify([{ beforeText: 'teh', afterText: 'thw', pos1: 6, pos2: 6 }], {
      original: 'I saw teh dog.',
      modified: 'I saw thw dog.'
    })
    expect(unknown[0]).toMatchObject({ category: 'undefined', decidedBy: 'spelling' })
    expect(check).not.toHaveBeenCalled()
  })

  it('related single-word replacement is a substitution', async () => {
    const services = makeServices({ relatedness: new FakeRelatedness({ scores: { 'big#a|large#a': 6 } }) })
    const pipeline = new ClassificationPipeline(services, DEFAULT_CLASSIFIER_CONFIG, quietLogger())
    const records = await pipeline.classify([{ beforeText: 'big', afterText: 'large', pos1: 13, pos2: 13 }], {
      original: 'The house is big.',
      modified: 'The house is large.'
    })
    expect(records[0]).toMatchObject({ category: 'substitution', decidedBy: 'substitution' })
  })

  it('reworded sentence is a rephrasing', async () => {
    const pipeline = new ClassificationPipeline(makeServices(), DEFAULT_CLASSIFIER_CONFIG, quietLogger())
    const records = await pipeline.classify([{ beforeText: 'sat', afterText: 'was sitting', pos1: 8, pos2: 8 }], {
      original: 'The cat sat on the mat.',
      modified: 'The cat was sitting on the mat.'
    })
    expect(records[0]).toMatchObject({ category: 'rephrasing', decidedBy: 'rephrasing' })
  })

  it('grammar fix when the sentence is not similar enough to be a rephrasing', async () => {
    const grammar = new FakeGrammar({ 'tall tree': [violation('ADJ_ORDER')] })
    const config = { ...DEFAULT_CLASSIFIER_CONFIG, rephrasingMinSimilarity: 0.9 }
    const pipeline = new ClassificationPipeline(makeServices({ grammar }), config, quietLogger())
    const records = await pipeline.classify([{ beforeText: 'tall tree', afterText: 'tree', pos1: 4, pos2: 4 }], {
      original: 'The tall tree.',
      modified: 'The tree.'
    })
    expect(records[0]).toMatchObject({ category: 'grammar', decidedBy: 'grammar' })
  })

  it('a failing stage is skipped and the edit falls through to undefined', async () => {
    const relatedness = new FakeRelatedness()
    vi.spyOn(relatedness, 'synonyms').mockRejectedValue(new Error('wordnet unavailable'))
    vi.spyOn(relatedness, 'relatednessMatrix').mockRejectedValue(new Error('wordnet unavailable'))
    const logger = quietLogger()
    const warn = vi.spyOn(logger, 'warn')
    const pipeline = new ClassificationPipeline(makeServices({ relatedness }), DEFAULT_CLASSIFIER_CONFIG, logger)

    const records = await pipeline.classify([{ beforeText: 'tall', afterText: 'huge', pos1: 12, pos2: 12 }], {
      original: 'The tree is tall.',
      modified: 'The tree is huge.'
    })
    expect(records[0]).toMatchObject({ category: 'undefined', decidedBy: null })
    expect(warn).toHaveBeenCalledWith(
      { stage: 'substitution', index: 0, err: 'wordnet unavailable' },
      'classifier stage failed; skipping'
    )
    expect(warn).toHaveBeenCalledWith(
      { stage: 'rephrasing', index: 0, err: 'wordnet unavailable' },
      'classifier stage failed; skipping'
    )
  })

  it('rewriting the whole document is a topic shift', async () => {
    const pipeline = new ClassificationPipeline(makeServices(), DEFAULT_CLASSIFIER_CONFIG, quietLogger())
    const original = 'Cats purr softly. Cats nap.'
    const modified = 'Stocks fell sharply. Markets panicked. Traders sold. Banks closed.'
    const records = await pipeline.classify([{ beforeText: original, afterText: modified, pos1: 0, pos2: 0 }], {
      original,
      modified
    })
    expect(records[0]).toMatchObject({ category: 'topic_shift', decidedBy: 'topic_shift' })
  })

  it('keeps input order and reports progress', async () => {
    const config = { ...DEFAULT_CLASSIFIER_CONFIG, concurrency: 2 }
    const pipeline = new ClassificationPipeline(makeServices(), config, quietLogger())
    const original = 'a, b; c "x" d'
    const modified = 'a b, c "y" d'
    const edits = [
      { beforeText: ',', afterText: '', pos1: 1, pos2: 1 },
      { beforeText: ';', afterText: ',', pos1: 4, pos2: 3 },
      { beforeText: '"x"', afterText: '"y"', pos1: 8, pos2: 7 }
    ]
    const onProgress = vi.fn()
    const records = await pipeline.classify(edits, { original, modified }, { onProgress })

    expect(records.map((r) => [r.index, r.category])).toEqual([
      [0, 'formatting'],
      [1, 'formatting'],
      [2, 'citation']
    ])
    expect(onProgress).toHaveBeenCalledTimes(3)
    expect(onProgress).toHaveBeenLastCalledWith({ completed: 3, total: 3 })
  })

  it('classifying twice gives the same categories', async () => {
    const pipeline = new ClassificationPipeline(makeServices(), DEFAULT_CLASSIFIER_CONFIG, quietLogger())
    const doc = { original: 'I saw teh dog.', modified: 'I saw the dog.' }
    const edits = [{ beforeText: 'teh', afterText: 'the', pos1: 6, pos2: 6 }]
    expect(await pipeline.classify(edits, doc)).toEqual(await pipeline.classify(edits, doc))
  })

  it('rejects the whole pair on a malformed edit before classifying', async () => {
    const services = makeServices()
    const check = vi.spyOn(services.grammar, 'check')
    const pipeline = new ClassificationPipeline(services, DEFAULT_CLASSIFIER_CONFIG, quietLogger())
    const doc = { original: 'abc', modified: 'abd' }
    await expect(
      pipeline.classify(
        [
          { beforeText: 'c', afterText: 'd', pos1: 2, pos2: 2 },
          { beforeText: 'zz', afterText: '', pos1: 2, pos2: 3 }
        ],
        doc
      )
    ).rejects.toBeInstanceOf(MalformedEditError)
    expect(check).not.toHaveBeenCalled()
  })

  it('classifyDocuments derives edits with the diff engine', async () => {
    const services = makeServices({ relatedness: new FakeRelatedness({ scores: { 'cat#n|dog#n': 7 } }) })
    const pipeline = new ClassificationPipeline(services, DEFAULT_CLASSIFIER_CONFIG, quietLogger())
    const records = await pipeline.classifyDocuments('The cat sat.', 'The dog sat.')
    expect(records).toEqual([
      {
        index: 0,
        edit: { beforeText: 'cat', afterText: 'dog', pos1: 4, pos2: 4 },
        category: 'substitution',
        decidedBy: 'substitution'
      }
    ])
  })

  it('a typo split into in-word diff fragments is still spelling', async () => {
    const pipeline = new ClassificationPipeline(makeServices(), DEFAULT_CLASSIFIER_CONFIG, quietLogger())
    const records = await pipeline.classifyDocuments('I saw teh dog.', 'I saw the dog.')
    expect(records.length).toBeGreaterThan(0)
    for (const r of records) {
      expect(r.edit.beforeText).not.toBe('teh')
      expect(r).toMatchObject({ category: 'spelling', decidedBy: 'spelling' })
    }
  })

  it('a one-letter change inside a word is judged on the whole word', async () => {
    const pipeline = new ClassificationPipeline(makeServices(), DEFAULT_CLASSIFIER_CONFIG, quietLogger())
    const records = await pipeline.classifyDocuments('The cat sat.', 'The cat sit.')
    expect(records).toEqual([
      {
        index: 0,
        edit: { beforeText: 'a', afterText: 'i', pos1: 9, pos2: 9 },
        category: 'substitution',
        decidedBy: 'substitution'
      }
    ])
  })

  it('summarizeRecords counts every category', () => {
    const edit = { beforeText: '', afterText: '', pos1: 0, pos2: 0 }
    expect(
      summarizeRecords([
        { index: 0, edit, category: 'citation', decidedBy: 'citation' },
        { index: 1, edit, category: 'undefined', decidedBy: null },
        { index: 2, edit, category: 'citation', decidedBy: 'citation' }
      ])
    ).toEqual({
      citation: 2,
      formatting: 0,
      spelling: 0,
      substitution: 0,
      rephrasing: 0,
      grammar: 0,
      topic_shift: 0,
      undefined: 1
    })
  })
})
