export type Tag = string

export type Vocabulary = ReadonlyArray<Tag>

export interface ScoredTag {
  tag: Tag
  score: number
}

/** Top-K tags, score descending, ties in vocabulary order. */
export type RankingResult = ScoredTag[]

export interface CaptionRecord {
  file: string
  caption: string
  tags: Tag[]
  model: string
}

/** JSON body returned by the upload endpoint of the captioning server. */
export interface CaptionResponse {
  filename: string
  caption: string
  tags: Tag[]
  model: string
  top_k: number
}

export interface CaptionFailure {
  file: string
  error: string
}

export interface BatchCaptionResult {
  records: CaptionRecord[]
  failures: CaptionFailure[]
}

/**
 * Produces embeddings for audio clips and tag texts in a shared space.
 * Decoding and model loading belong to the implementation.
 */
export interface Embedder {
  readonly modelName: string
  embedAudio(audioPath: string): Promise<number[]>
  embedText(texts: readonly string[]): Promise<number[][]>
}
