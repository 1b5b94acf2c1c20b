import path from 'path'
import type { CaptionRecord, CaptionResponse } from '../types/index.js'

const TABLE_TITLE = 'Captions'
const FILE_HEADER = 'File'
const CAPTION_HEADER = 'Caption (top-k tags)'

export function toJson(records: readonly CaptionRecord[]): string {
  return JSON.stringify(records, null, 2)
}

// Spaced separators, the way caption rows have always been written to .jsonl
function toJsonLine(record: CaptionRecord): string {
  const tags = record.tags.map((tag) => JSON.stringify(tag)).join(', ')
  return (
    `{"file": ${JSON.stringify(record.file)}, ` +
    `"caption": ${JSON.stringify(record.caption)}, ` +
    `"tags": [${tags}], ` +
    `"model": ${JSON.stringify(record.model)}}`
  )
}

export function toJsonl(records: readonly CaptionRecord[]): string {
  return records.map((record) => toJsonLine(record) + '\n').join('')
}

export function toCaptionText(record: CaptionRecord): string {
  return record.caption + '\n'
}

/**
 * Two-column text table of file basename and caption, under a `Captions` title.
 */
export function toCaptionTable(records: readonly CaptionRecord[]): string {
  const rows = records.map((record) => ({ name: path.basename(record.file), caption: record.caption }))
  const fileWidth = Math.max(FILE_HEADER.length, ...rows.map((row) => row.name.length))
  const captionWidth = Math.max(CAPTION_HEADER.length, ...rows.map((row) => row.caption.length))

  const lines = [
    TABLE_TITLE,
    `${FILE_HEADER.padEnd(fileWidth)} | ${CAPTION_HEADER}`,
    `${'-'.repeat(fileWidth)}-+-${'-'.repeat(captionWidth)}`,
    ...rows.map((row) => `${row.name.padEnd(fileWidth)} | ${row.caption}`),
  ]
  return lines.map((line) => line + '\n').join('')
}

/** `clips/take 1.wav` -> `take 1.txt` */
export function captionFileName(file: string): string {
  return path.parse(file).name + '.txt'
}

export function toCaptionResponse(filename: string, record: CaptionRecord, topK: number): CaptionResponse {
  return {
    filename,
    caption: record.caption,
    tags: record.tags,
    model: record.model,
    top_k: topK,
  }
}
