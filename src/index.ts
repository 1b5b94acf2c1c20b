import 'dotenv/config'

export { createCaptioner, type Captioner, type CaptionerOptions } from './app.js'
export {
  loadCaptionConfig,
  parseBooleanEnv,
  parseIntegerEnv,
  DEFAULT_MODEL_NAME,
  DEFAULT_TOP_K,
  DEFAULT_CONCURRENCY,
  type CaptionConfig,
  type CaptionConfigOptions,
} from './config.js'
export {
  DEFAULT_TAGS,
  SUPPORTED_AUDIO_EXTENSIONS,
  isSupportedAudioFile,
  loadVocabulary,
  parseTagList,
} from './constants/tagVocabulary.js'
export { InvalidArgumentError, UnsupportedAudioError, type CaptionErrorCode } from './services/errors.js'
export { PlaceholderEmbedder, PLACEHOLDER_MODEL_NAME } from './services/embedder.js'
export { cosineSimilarity, scoreVocabulary } from './services/similarity.js'
export { CAPTION_DELIMITER, formatCaption, pairScores, rankTags } from './services/tagRanking.js'
export { TagInferencer, type BatchOptions, type TagInferencerOptions } from './services/tagInference.js'
export {
  captionFileName,
  toCaptionResponse,
  toCaptionTable,
  toCaptionText,
  toJson,
  toJsonl,
} from './services/captionPresenter.js'
export type * from './types/index.js'
