import { InvalidArgumentError } from './services/errors.js'

export const DEFAULT_MODEL_NAME = 'laion/clap-htsat-fused'
export const DEFAULT_TOP_K = 3
export const DEFAULT_CONCURRENCY = 3

const TRUTHY = new Set(['1', 'true', 'yes', 'on'])

export interface CaptionConfig {
  topK: number
  modelName: string
  tagsFile: string | null
  concurrency: number
  verbose: boolean
}

export type CaptionConfigOptions = Partial<CaptionConfig>

export function parseBooleanEnv(value: string | undefined, fallback: boolean): boolean {
  if (!value || value.trim() === '') return fallback
  return TRUTHY.has(value.trim().toLowerCase())
}

export function parseIntegerEnv(name: string, value: string | undefined, fallback: number): number {
  if (!value || value.trim() === '') return fallback
  const trimmed = value.trim()
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be an integer, got "${value}"`)
  }
  return Number(trimmed)
}

/**
 * Resolve settings from explicit options, then the environment, then defaults.
 */
export function loadCaptionConfig(
  options: CaptionConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): CaptionConfig {
  const topK = options.topK ?? parseIntegerEnv('CAPTION_TOP_K', env.CAPTION_TOP_K, DEFAULT_TOP_K)
  if (!Number.isInteger(topK) || topK < 0) {
    throw new InvalidArgumentError(`topK must be a non-negative integer, got ${topK}`)
  }

  const concurrency =
    options.concurrency ?? parseIntegerEnv('CAPTION_CONCURRENCY', env.CAPTION_CONCURRENCY, DEFAULT_CONCURRENCY)
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidArgumentError(`concurrency must be a positive integer, got ${concurrency}`)
  }

  return {
    topK,
    modelName: options.modelName || env.CAPTION_MODEL || DEFAULT_MODEL_NAME,
    // an explicit null switches off CAPTION_TAGS_FILE
    tagsFile: options.tagsFile !== undefined ? options.tagsFile : env.CAPTION_TAGS_FILE || null,
    concurrency,
    verbose: options.verbose ?? parseBooleanEnv(env.CAPTION_VERBOSE, false),
  }
}
