import { afterEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_CLASSIFIER_CONFIG, getClassifierConfig, getLanguageToolConfig } from '../../src/lib/config'

const NAMES = [
  'SPELLING_MAX_DISTANCE',
  'SUBSTITUTION_MIN_RELATEDNESS',
  'REPHRASING_MIN_SIMILARITY',
  'TOPIC_MAX_DIVERGENCE',
  'TOPIC_MAX_FEATURES',
  'RELATEDNESS_MOST_FREQUENT_SENSE',
  'CLASSIFY_CONCURRENCY'
]

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('defaults when nothing is set', () => {
    for (const name of NAMES) vi.stubEnv(name, '')
    expect(getClassifierConfig()).toEqual(DEFAULT_CLASSIFIER_CONFIG)
  })

  it('reads, clamps and ignores garbage', () => {
    vi.stubEnv('SPELLING_MAX_DISTANCE', '99')
    vi.stubEnv('REPHRASING_MIN_SIMILARITY', 'abc')
    vi.stubEnv('TOPIC_MAX_DIVERGENCE', '0.25')
    vi.stubEnv('RELATEDNESS_MOST_FREQUENT_SENSE', 'yes')
    vi.stubEnv('CLASSIFY_CONCURRENCY', '0')
    const cfg = getClassifierConfig()
    expect(cfg.spellingMaxDistance).toBe(10)
    expect(cfg.rephrasingMinSimilarity).toBe(0.3)
    expect(cfg.topicMaxDivergence).toBe(0.25)
    expect(cfg.relatedness).toEqual({ mostFrequentSense: true })
    expect(cfg.concurrency).toBe(1)
  })

  it('LanguageTool endpoint without a trailing slash', () => {
    vi.stubEnv('LANGUAGETOOL_URL', 'http://languagetool.test:8010/')
    vi.stubEnv('LANGUAGETOOL_TIMEOUT_MS', '50')
    vi.stubEnv('LANGUAGETOOL_LANGUAGE', '')
    expect(getLanguageToolConfig()).toEqual({ baseUrl: 'http://languagetool.test:8010', language: 'en-US', timeoutMs: 200 })
  })
})
