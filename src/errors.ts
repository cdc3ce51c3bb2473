// Build error taxonomy
// Every failure is fatal to the build; nothing here is retried.

export class FontBuildError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// No source images to build from
export class EmptyInputError extends FontBuildError {
  constructor(source?: string) {
    super(source ? `No PNG images found in ${source}` : 'No source images to build from')
  }
}

// Legacy file name that does not encode a usable codepoint
export class InvalidCodepointError extends FontBuildError {
  readonly fileName: string

  constructor(fileName: string, reason: string) {
    super(`Invalid codepoint in "${fileName}": ${reason}`)
    this.fileName = fileName
  }
}

export class UnreadableImageError extends FontBuildError {
  readonly source: string

  constructor(source: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(`Cannot decode image "${source}"${detail}`, { cause })
    this.source = source
  }
}

// Non-positive, non-integer or duplicated strike size
export class InvalidSizeError extends FontBuildError {
  readonly size: number

  constructor(size: number, reason = 'size must be a positive integer') {
    super(`Invalid size ${size}: ${reason}`)
    this.size = size
  }
}

export class SerializationError extends FontBuildError {
  constructor(message: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(`${message}${detail}`, { cause })
  }
}
