import { afterEach, describe, expect, it, vi } from 'vitest'
import fs from 'fs'
import path from 'path'
import { createCaptioner } from '../src/app.js'
import { DEFAULT_TAGS } from '../src/constants/tagVocabulary.js'
import type { CaptionConfig } from '../src/config.js'
import type { Embedder } from '../src/types/index.js'
import { TEST_DATA_DIR } from './setup.js'

function axisEmbedder(modelName: string): Embedder {
  return {
    modelName,
    embedAudio: async () => [1, 0],
    embedText: async (texts) => texts.map((_, i) => (i === 0 ? [1, 0] : [0, 1])),
  }
}

describe('createCaptioner', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('captions with the placeholder model and default vocabulary', async () => {
    const captioner = await createCaptioner({ env: {} })
    const record = await captioner.captionFile('clips/loop.wav')

    expect(captioner.config.topK).toBe(3)
    expect(captioner.inferencer.vocabulary).toEqual(DEFAULT_TAGS)
    expect(record.model).toBe('placeholder-clap')
    expect(record.tags).toHaveLength(3)
    expect(record.tags.every((tag) => DEFAULT_TAGS.includes(tag))).toBe(true)
    expect(record.caption).toBe(record.tags.join(', '))
  })

  it('loads the vocabulary from the configured tags file', async () => {
    const tagsFile = path.join(TEST_DATA_DIR, 'captioner-tags.txt')
    fs.writeFileSync(tagsFile, 'kick\nsnare\n', 'utf-8')

    const captioner = await createCaptioner({
      env: { CAPTION_TAGS_FILE: tagsFile, CAPTION_TOP_K: '5' },
      createEmbedder: (config) => axisEmbedder(config.modelName),
    })
    const record = await captioner.captionFile('beat.wav')

    expect(record).toEqual({
      file: 'beat.wav',
      caption: 'kick, snare',
      tags: ['kick', 'snare'],
      model: 'laion/clap-htsat-fused',
    })
  })

  it('hands the resolved config to the embedder factory', async () => {
    const seen: CaptionConfig[] = []
    await createCaptioner({
      modelName: 'local/clap',
      vocabulary: ['rain'],
      env: {},
      createEmbedder: (config) => {
        seen.push(config)
        return axisEmbedder(config.modelName)
      },
    })

    expect(seen).toHaveLength(1)
    expect(seen[0].modelName).toBe('local/clap')
  })

  it('keeps the placeholder model name when no embedder factory is given', async () => {
    const captioner = await createCaptioner({ modelName: 'local/clap', vocabulary: ['rain'], env: {} })

    expect(captioner.config.modelName).toBe('local/clap')
    expect(await captioner.captionFile('storm.ogg')).toMatchObject({ model: 'placeholder-clap' })
  })

  it('logs a ready line only when verbose', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    await createCaptioner({ vocabulary: ['rain', 'wind'], env: {} })
    expect(log).not.toHaveBeenCalled()

    await createCaptioner({ vocabulary: ['rain', 'wind'], env: { CAPTION_VERBOSE: 'true' } })
    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith('Captioner ready: 2 tags, top-k 3, model placeholder-clap')
  })

  it('produces an empty caption for topK 0', async () => {
    const captioner = await createCaptioner({ topK: 0, vocabulary: ['rain', 'wind'], env: {} })

    expect(await captioner.captionFile('storm.ogg')).toMatchObject({ caption: '', tags: [] })
  })

  it('captions a batch with the configured concurrency', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const captioner = await createCaptioner({
      vocabulary: ['kick', 'snare'],
      topK: 1,
      env: { CAPTION_CONCURRENCY: '2' },
      createEmbedder: (config) => axisEmbedder(config.modelName),
    })

    const result = await captioner.captionFiles(['a.wav', 'readme.md', 'b.webm'])

    expect(captioner.config.concurrency).toBe(2)
    expect(result.records.map((record) => [record.file, record.caption])).toEqual([
      ['a.wav', 'kick'],
      ['b.webm', 'kick'],
    ])
    expect(result.failures).toEqual([{ file: 'readme.md', error: 'Unsupported audio file: readme.md' }])
  })
})
