import type { RankingResult, ScoredTag, Vocabulary } from '../types/index.js'
import { InvalidArgumentError } from './errors.js'

export const CAPTION_DELIMITER = ', '

interface IndexedTag {
  entry: ScoredTag
  index: number
}

// NaN sorts after every real score; remaining ties fall back to vocabulary order
function compareRanked(a: IndexedTag, b: IndexedTag): number {
  const x = a.entry.score
  const y = b.entry.score
  const xNaN = Number.isNaN(x)
  const yNaN = Number.isNaN(y)

  if (xNaN !== yNaN) return xNaN ? 1 : -1
  if (!xNaN && x !== y) return x > y ? -1 : 1
  return a.index - b.index
}

/**
 * Zip a vocabulary with its per-tag scores.
 */
export function pairScores(vocabulary: Vocabulary, scores: readonly number[]): ScoredTag[] {
  if (vocabulary.length !== scores.length) {
    throw new InvalidArgumentError(
      `score count (${scores.length}) does not match vocabulary size (${vocabulary.length})`
    )
  }
  return vocabulary.map((tag, i) => ({ tag, score: scores[i] }))
}

/**
 * Select the `topK` highest-scoring tags.
 *
 * The sort is keyed on score alone; equal scores keep the order they had in
 * `scores`, which is the vocabulary order. `topK` above the number of tags is
 * clamped, and an empty input yields an empty result for any valid `topK`.
 */
export function rankTags(scores: readonly ScoredTag[], topK: number): RankingResult {
  if (!Number.isInteger(topK)) {
    throw new InvalidArgumentError(`topK must be an integer, got ${topK}`)
  }
  if (topK < 0) {
    throw new InvalidArgumentError(`topK must be >= 0, got ${topK}`)
  }

  const limit = Math.min(topK, scores.length)
  if (limit === 0) return []

  return scores
    .map((entry, index) => ({ entry, index }))
    .sort(compareRanked)
    .slice(0, limit)
    .map(({ entry }) => ({ tag: entry.tag, score: entry.score }))
}

export function formatCaption(result: readonly ScoredTag[]): string {
  return result.map((entry) => entry.tag).join(CAPTION_DELIMITER)
}
