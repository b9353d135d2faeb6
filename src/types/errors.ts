export class StreamRelayError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number,
    public details?: unknown,
  ) {
    super(message)
    this.name = 'StreamRelayError'
  }
}

export class InvalidRequestError extends StreamRelayError {
  constructor(message = 'Invalid request parameters', details?: unknown) {
    super(message, 'INVALID_REQUEST', 400, details)
    this.name = 'InvalidRequestError'
  }
}

export class InvalidVideoIdError extends StreamRelayError {
  constructor() {
    super('Invalid video ID', 'INVALID_VIDEO_ID', 400)
    this.name = 'InvalidVideoIdError'
  }
}

export class UnauthorizedError extends StreamRelayError {
  constructor(message = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401)
    this.name = 'UnauthorizedError'
  }
}

export type ExtractionFailureReason =
  | 'bot-check'
  | 'cookies-invalid'
  | 'live-not-started'
  | 'malformed'
  | 'unknown'

const extractionMessages: Record<ExtractionFailureReason, string> = {
  'bot-check': 'Upstream blocked this server (bot check)',
  'cookies-invalid': 'Configured extraction cookies are invalid or rotated',
  'live-not-started': 'This live event has not started yet',
  malformed: 'Extraction tool returned an unreadable response',
  unknown: 'Failed to get stream URLs',
}

export class ExtractionFailedError extends StreamRelayError {
  constructor(public reason: ExtractionFailureReason, details?: unknown) {
    super(
      extractionMessages[reason],
      reason === 'live-not-started' ? 'LIVE_NOT_STARTED' : 'EXTRACTION_FAILED',
      reason === 'live-not-started' ? 409 : 500,
      details,
    )
    this.name = 'ExtractionFailedError'
  }
}

export class ExtractionTimeoutError extends StreamRelayError {
  constructor(timeoutMs: number) {
    super(
      `Extraction timed out after ${timeoutMs}ms`,
      'EXTRACTION_TIMEOUT',
      504,
    )
    this.name = 'ExtractionTimeoutError'
  }
}

export class VideoNotFoundError extends StreamRelayError {
  constructor(details?: unknown) {
    super('Video not found', 'VIDEO_NOT_FOUND', 404, details)
    this.name = 'VideoNotFoundError'
  }
}

export class DownloadFailedError extends StreamRelayError {
  constructor(message: string, details?: unknown) {
    super(message, 'DOWNLOAD_FAILED', 500, details)
    this.name = 'DownloadFailedError'
  }
}

export class NoPlayableStreamError extends StreamRelayError {
  constructor() {
    super('No playable streams found', 'NO_PLAYABLE_STREAM', 404)
    this.name = 'NoPlayableStreamError'
  }
}

export class MissingTokenError extends StreamRelayError {
  constructor() {
    super('Missing stream token', 'MISSING_TOKEN', 401)
    this.name = 'MissingTokenError'
  }
}

export class ExpiredTokenError extends StreamRelayError {
  constructor() {
    super('Expired stream token', 'EXPIRED_TOKEN', 401)
    this.name = 'ExpiredTokenError'
  }
}

export class InvalidTokenError extends StreamRelayError {
  constructor() {
    super('Invalid stream token', 'INVALID_TOKEN', 403)
    this.name = 'InvalidTokenError'
  }
}

export class StreamNotFoundError extends StreamRelayError {
  constructor() {
    super('No stream URL found', 'STREAM_NOT_FOUND', 404)
    this.name = 'StreamNotFoundError'
  }
}

export class UpstreamFetchFailedError extends StreamRelayError {
  constructor(details?: unknown) {
    super('Failed to proxy stream', 'UPSTREAM_FETCH_FAILED', 500, details)
    this.name = 'UpstreamFetchFailedError'
  }
}
