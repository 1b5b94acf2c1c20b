/**
 * Default tag vocabulary and supported audio types.
 * The vocabulary is passed explicitly to every inferencer; nothing here is mutated.
 */

import { promises as fs } from 'fs'
import path from 'path'
import type { Tag } from '../types/index.js'

export const DEFAULT_TAGS: ReadonlyArray<Tag> = Object.freeze([
  'speech',
  'male voice',
  'female voice',
  'music',
  'instrumental',
  'drums',
  'guitar',
  'piano',
  'bass',
  'synth',
  'loop',
  'ambient',
  'crowd',
  'applause',
  'footsteps',
  'rain',
  'wind',
  'birdsong',
  'engine',
  'noise',
])

export const SUPPORTED_AUDIO_EXTENSIONS: ReadonlyArray<string> = Object.freeze([
  '.wav',
  '.mp3',
  '.flac',
  '.ogg',
  '.m4a',
  '.webm',
])

const SUPPORTED_AUDIO_EXTENSION_SET = new Set<string>(SUPPORTED_AUDIO_EXTENSIONS)

export function isSupportedAudioFile(filePath: string): boolean {
  return SUPPORTED_AUDIO_EXTENSION_SET.has(path.extname(filePath).toLowerCase())
}

/**
 * Parse a newline separated tag list, dropping blank lines.
 */
export function parseTagList(text: string): Tag[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
}

export async function loadVocabulary(tagsFile?: string): Promise<Tag[]> {
  if (!tagsFile) return [...DEFAULT_TAGS]

  const tags = parseTagList(await fs.readFile(tagsFile, 'utf-8'))
  if (tags.length === 0) {
    console.warn(`No valid tags in ${tagsFile}; using defaults`)
    return [...DEFAULT_TAGS]
  }
  return tags
}
