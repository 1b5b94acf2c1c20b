import type {
  BatchCaptionResult,
  CaptionFailure,
  CaptionRecord,
  Embedder,
  Tag,
  Vocabulary,
} from '../types/index.js'
import { isSupportedAudioFile } from '../constants/tagVocabulary.js'
import { InvalidArgumentError, UnsupportedAudioError } from './errors.js'
import { scoreVocabulary } from './similarity.js'
import { formatCaption, rankTags } from './tagRanking.js'

const DEFAULT_CONCURRENCY = 3

export interface TagInferencerOptions {
  vocabulary: Vocabulary
  topK: number
  verbose?: boolean
}

export interface BatchOptions {
  concurrency?: number
}

/**
 * Captions audio files by ranking a fixed vocabulary against each clip.
 *
 * Tag embeddings are computed on first use and reused for every file.
 */
export class TagInferencer {
  readonly vocabulary: ReadonlyArray<Tag>
  readonly topK: number
  private readonly verbose: boolean
  private tagVectors: Promise<number[][]> | null = null

  constructor(private readonly embedder: Embedder, options: TagInferencerOptions) {
    if (!Number.isInteger(options.topK) || options.topK < 0) {
      throw new InvalidArgumentError(`topK must be a non-negative integer, got ${options.topK}`)
    }
    this.vocabulary = Object.freeze([...options.vocabulary])
    this.topK = options.topK
    this.verbose = options.verbose ?? false
  }

  get modelName(): string {
    return this.embedder.modelName
  }

  private loadTagVectors(): Promise<number[][]> {
    if (!this.tagVectors) {
      if (this.verbose) console.log(`Embedding ${this.vocabulary.length} tags with ${this.modelName}...`)
      this.tagVectors = this.embedder.embedText(this.vocabulary).catch((error: unknown) => {
        // allow a later call to retry
        this.tagVectors = null
        throw error
      })
    }
    return this.tagVectors
  }

  async inferFile(file: string): Promise<CaptionRecord> {
    if (!isSupportedAudioFile(file)) {
      throw new UnsupportedAudioError(file)
    }

    const tagVectors = await this.loadTagVectors()
    const audio = await this.embedder.embedAudio(file)
    const ranked = rankTags(scoreVocabulary(audio, this.vocabulary, tagVectors), this.topK)

    return {
      file,
      caption: formatCaption(ranked),
      tags: ranked.map((entry) => entry.tag),
      model: this.modelName,
    }
  }

  /**
   * Caption many files with at most `concurrency` in flight.
   * Records and failures come back in input order; one bad file does not stop the batch.
   */
  async inferMany(files: readonly string[], options: BatchOptions = {}): Promise<BatchCaptionResult> {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidArgumentError(`concurrency must be a positive integer, got ${concurrency}`)
    }

    const outcomes: Array<CaptionRecord | CaptionFailure> = new Array(files.length)
    const processing = new Set<Promise<void>>()
    let next = 0

    const run = async (index: number): Promise<void> => {
      const file = files[index]
      if (this.verbose) console.log(`Captioning ${file}...`)
      try {
        outcomes[index] = await this.inferFile(file)
      } catch (error) {
        console.error(`Error captioning ${file}:`, error)
        outcomes[index] = { file, error: error instanceof Error ? error.message : String(error) }
      }
    }

    while (next < files.length || processing.size > 0) {
      while (next < files.length && processing.size < concurrency) {
        const promise: Promise<void> = run(next).finally(() => {
          processing.delete(promise)
        })
        processing.add(promise)
        next++
      }

      if (processing.size > 0) {
        await Promise.race(processing)
      }
    }

    const records: CaptionRecord[] = []
    const failures: CaptionFailure[] = []
    for (const outcome of outcomes) {
      if ('error' in outcome) failures.push(outcome)
      else records.push(outcome)
    }

    if (this.verbose) console.log(`Captioned ${records.length} of ${files.length} files`)
    return { records, failures }
  }
}
