/**
 * tag-normalizer module: public API re-exports
 */

export type { TagNormalizer, SynonymTable } from './tag-normalizer.js'
export {
  TagNormalizerImpl,
  createTagNormalizer,
  defaultTagNormalizer,
  normalizeTag,
} from './tag-normalizer.js'
export { DEFAULT_TAG_SYNONYMS } from './synonyms.js'
