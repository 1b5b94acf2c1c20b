import type { BatchCaptionResult, CaptionRecord, Embedder, Tag } from './types/index.js'
import { loadCaptionConfig, type CaptionConfig, type CaptionConfigOptions } from './config.js'
import { loadVocabulary } from './constants/tagVocabulary.js'
import { PlaceholderEmbedder } from './services/embedder.js'
import { TagInferencer } from './services/tagInference.js'

export interface CaptionerOptions extends CaptionConfigOptions {
  /** Explicit vocabulary; takes precedence over `tagsFile`. */
  vocabulary?: readonly Tag[]
  /**
   * Builds the embedder from the resolved config. `modelName` only reaches a
   * custom embedder; the default placeholder reports its own model name.
   */
  createEmbedder?: (config: CaptionConfig) => Embedder
  env?: NodeJS.ProcessEnv
}

export interface Captioner {
  config: CaptionConfig
  inferencer: TagInferencer
  captionFile(file: string): Promise<CaptionRecord>
  captionFiles(files: readonly string[]): Promise<BatchCaptionResult>
}

export async function createCaptioner(options: CaptionerOptions = {}): Promise<Captioner> {
  const { vocabulary, createEmbedder, env, ...configOptions } = options
  const config = loadCaptionConfig(configOptions, env)

  const tags = vocabulary ? [...vocabulary] : await loadVocabulary(config.tagsFile ?? undefined)
  const embedder = createEmbedder ? createEmbedder(config) : new PlaceholderEmbedder()
  const inferencer = new TagInferencer(embedder, {
    vocabulary: tags,
    topK: config.topK,
    verbose: config.verbose,
  })

  if (config.verbose) {
    console.log(`Captioner ready: ${tags.length} tags, top-k ${config.topK}, model ${inferencer.modelName}`)
  }

  return {
    config,
    inferencer,
    captionFile: (file) => inferencer.inferFile(file),
    captionFiles: (files) => inferencer.inferMany(files, { concurrency: config.concurrency }),
  }
}
