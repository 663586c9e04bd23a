/**
 * Unit tests for the TagNormalizer.
 */

import { describe, it, expect } from 'vitest'
import {
  TagNormalizerImpl,
  createTagNormalizer,
  defaultTagNormalizer,
  normalizeTag,
} from '../tag-normalizer.js'
import { DEFAULT_TAG_SYNONYMS } from '../synonyms.js'
import { ConfigError } from '../../../core/errors.js'

describe('TagNormalizer', () => {
  describe('normalize', () => {
    it('maps synonyms onto their canonical key', () => {
      expect(normalizeTag('jwt')).toBe('auth')
      expect(normalizeTag('authentication')).toBe('auth')
      expect(normalizeTag('message-queue')).toBe('kafka')
      expect(normalizeTag('exception')).toBe('error')
      expect(normalizeTag('tracing')).toBe('log')
    })

    it('is case and whitespace insensitive', () => {
      expect(normalizeTag('  JWT ')).toBe('auth')
      expect(normalizeTag('Logging')).toBe('log')
    })

    it('passes unknown tags through lower-cased and trimmed', () => {
      expect(normalizeTag('  GraphQL  ')).toBe('graphql')
    })

    it('returns canonical keys unchanged', () => {
      expect(normalizeTag('auth')).toBe('auth')
    })

    it('returns an empty string for blank input', () => {
      expect(normalizeTag('')).toBe('')
      expect(normalizeTag('   ')).toBe('')
    })

    it('is idempotent over the whole vocabulary and arbitrary input', () => {
      const inputs = [
        ...Object.keys(DEFAULT_TAG_SYNONYMS),
        ...Object.values(DEFAULT_TAG_SYNONYMS).flat(),
        'Bearer-Token',
        '  Kafka ',
        'unknown-tag',
        'MiXeD Case',
        '',
      ]
      for (const input of inputs) {
        const once = normalizeTag(input)
        expect(normalizeTag(once)).toBe(once)
      }
    })
  })

  describe('normalizeTags', () => {
    it('deduplicates after normalization, keeping first-seen order', () => {
      expect(defaultTagNormalizer.normalizeTags(['jwt', 'api', 'auth', 'REST', ' '])).toEqual([
        'auth',
        'api',
      ])
    })
  })

  describe('relatedTags', () => {
    it('lists the synonyms of the canonical form', () => {
      expect(defaultTagNormalizer.relatedTags('jwt')).toEqual([
        'authentication',
        'jwt',
        'bearer-token',
      ])
    })

    it('returns an empty list for tags outside the vocabulary', () => {
      expect(defaultTagNormalizer.relatedTags('graphql')).toEqual([])
      expect(defaultTagNormalizer.relatedTags('constructor')).toEqual([])
    })
  })

  describe('extra synonyms', () => {
    it('extends an existing canonical key', () => {
      const normalizer = createTagNormalizer({ auth: ['OAuth'] })
      expect(normalizer.normalize('oauth')).toBe('auth')
      expect(normalizer.normalize('jwt')).toBe('auth')
    })

    it('adds new canonical keys', () => {
      const normalizer = createTagNormalizer({ ui: ['frontend', 'view'] })
      expect(normalizer.normalize('Frontend')).toBe('ui')
    })

    it('rejects a canonical key that is also a synonym', () => {
      expect(() => new TagNormalizerImpl({ auth: ['jwt'], jwt: ['token'] })).toThrow(ConfigError)
    })

    it('rejects a synonym claimed by two canonical keys', () => {
      expect(() => createTagNormalizer({ security: ['jwt'] })).toThrow(ConfigError)
    })
  })
})
