/**
 * TagNormalizer: canonicalizes free-form tags to a controlled vocabulary.
 *
 * `normalize` lower-cases and trims its input, then maps known synonyms onto
 * their canonical key. Unknown tags pass through cleaned but otherwise
 * unchanged. The function is pure and idempotent.
 */

import { ConfigError } from '../../core/errors.js'
import { DEFAULT_TAG_SYNONYMS } from './synonyms.js'

// ---------------------------------------------------------------------------
// TagNormalizer interface
// ---------------------------------------------------------------------------

export interface TagNormalizer {
  /** Canonical form of a single tag ('' for blank input) */
  normalize(tag: string): string
  /** Canonical forms of a tag list, blanks dropped, duplicates removed in first-seen order */
  normalizeTags(tags: readonly string[]): string[]
  /** Synonyms that collapse onto the canonical form of `tag` */
  relatedTags(tag: string): string[]
  /** The synonym table in effect */
  readonly synonyms: Readonly<Record<string, readonly string[]>>
}

export type SynonymTable = Readonly<Record<string, readonly string[]>>

function clean(tag: string): string {
  return tag.trim().toLowerCase()
}

// ---------------------------------------------------------------------------
// TagNormalizerImpl
// ---------------------------------------------------------------------------

export class TagNormalizerImpl implements TagNormalizer {
  readonly synonyms: SynonymTable
  private readonly _canonicalBySynonym: Map<string, string>

  /**
   * @throws {ConfigError} when a canonical key is also listed as a synonym,
   *   or one synonym is claimed by two canonical keys
   */
  constructor(table: SynonymTable) {
    const merged: Record<string, string[]> = {}
    for (const [rawCanonical, rawSynonyms] of Object.entries(table)) {
      const canonical = clean(rawCanonical)
      if (canonical === '') continue
      const list = Object.hasOwn(merged, canonical) ? (merged[canonical] ?? []) : []
      for (const raw of rawSynonyms) {
        const synonym = clean(raw)
        if (synonym !== '' && synonym !== canonical && !list.includes(synonym)) {
          list.push(synonym)
        }
      }
      merged[canonical] = list
    }

    const canonicalBySynonym = new Map<string, string>()
    for (const [canonical, list] of Object.entries(merged)) {
      for (const synonym of list) {
        if (Object.hasOwn(merged, synonym)) {
          throw new ConfigError(
            `Tag "${synonym}" is both a canonical tag and a synonym of "${canonical}"`,
            { canonical, synonym },
          )
        }
        const owner = canonicalBySynonym.get(synonym)
        if (owner !== undefined && owner !== canonical) {
          throw new ConfigError(
            `Tag synonym "${synonym}" is claimed by both "${owner}" and "${canonical}"`,
            { synonym, canonical, owner },
          )
        }
        canonicalBySynonym.set(synonym, canonical)
      }
    }

    this.synonyms = merged
    this._canonicalBySynonym = canonicalBySynonym
  }

  normalize(tag: string): string {
    if (!tag) return ''
    const cleaned = clean(tag)
    return this._canonicalBySynonym.get(cleaned) ?? cleaned
  }

  normalizeTags(tags: readonly string[]): string[] {
    const seen = new Set<string>()
    const result: string[] = []
    for (const tag of tags) {
      const normalized = this.normalize(tag)
      if (normalized === '' || seen.has(normalized)) continue
      seen.add(normalized)
      result.push(normalized)
    }
    return result
  }

  relatedTags(tag: string): string[] {
    const canonical = this.normalize(tag)
    return Object.hasOwn(this.synonyms, canonical) ? [...(this.synonyms[canonical] ?? [])] : []
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a TagNormalizer from the built-in vocabulary, extended with
 * `extraSynonyms` (synonym lists for the same canonical key are merged).
 */
export function createTagNormalizer(extraSynonyms: SynonymTable = {}): TagNormalizer {
  const table: Record<string, string[]> = {}
  for (const source of [DEFAULT_TAG_SYNONYMS, extraSynonyms]) {
    for (const [canonical, list] of Object.entries(source)) {
      const existing = Object.hasOwn(table, canonical) ? (table[canonical] ?? []) : []
      table[canonical] = [...existing, ...list]
    }
  }
  return new TagNormalizerImpl(table)
}

/** Normalizer over the built-in vocabulary */
export const defaultTagNormalizer: TagNormalizer = createTagNormalizer()

/** Normalize a tag against the built-in vocabulary */
export function normalizeTag(tag: string): string {
  return defaultTagNormalizer.normalize(tag)
}
