import type { ScoredTag, Vocabulary } from '../types/index.js'
import { InvalidArgumentError } from './errors.js'
import { pairScores } from './tagRanking.js'

/**
 * Cosine similarity of two vectors. A zero-length vector scores 0 against anything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new InvalidArgumentError(`vector dimensions differ: ${a.length} vs ${b.length}`)
  }

  const dotProduct = a.reduce((sum, val, i) => sum + val * b[i], 0)
  const magA = Math.sqrt(a.reduce((sum, val) => sum + val * val, 0))
  const magB = Math.sqrt(b.reduce((sum, val) => sum + val * val, 0))

  if (magA === 0 || magB === 0) return 0
  return dotProduct / (magA * magB)
}

/**
 * Score one audio embedding against every tag embedding, in vocabulary order.
 */
export function scoreVocabulary(
  audio: readonly number[],
  vocabulary: Vocabulary,
  tagVectors: ReadonlyArray<readonly number[]>
): ScoredTag[] {
  if (tagVectors.length !== vocabulary.length) {
    throw new InvalidArgumentError(
      `tag embedding count (${tagVectors.length}) does not match vocabulary size (${vocabulary.length})`
    )
  }
  return pairScores(vocabulary, tagVectors.map((vector) => cosineSimilarity(audio, vector)))
}
