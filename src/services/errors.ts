export type CaptionErrorCode = 'INVALID_ARGUMENT' | 'UNSUPPORTED_MEDIA_TYPE'

export class InvalidArgumentError extends Error {
  readonly code: CaptionErrorCode = 'INVALID_ARGUMENT'

  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export class UnsupportedAudioError extends Error {
  readonly code: CaptionErrorCode = 'UNSUPPORTED_MEDIA_TYPE'

  constructor(readonly file: string) {
    super(`Unsupported audio file: ${file}`)
    this.name = 'UnsupportedAudioError'
  }
}
