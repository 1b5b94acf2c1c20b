import type { Embedder } from '../types/index.js'

export const PLACEHOLDER_MODEL_NAME = 'placeholder-clap'
const PLACEHOLDER_DIM = 64

/**
 * Deterministic stand-in for a real audio-text model.
 * The audio file is never opened: every clip gets the same vector, and each
 * tag's vector depends only on its position in the request.
 */
export class PlaceholderEmbedder implements Embedder {
  readonly modelName = PLACEHOLDER_MODEL_NAME

  constructor(private readonly dim: number = PLACEHOLDER_DIM) {}

  async embedAudio(_audioPath: string): Promise<number[]> {
    return Array.from({ length: this.dim }, (_, i) => Math.sin(i))
  }

  async embedText(texts: readonly string[]): Promise<number[][]> {
    return texts.map((_, t) => Array.from({ length: this.dim }, (_, j) => Math.cos(t + j)))
  }
}
