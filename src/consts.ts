import type { MediaKind } from './types'

export const MP4_VIDEO = 'video/mp4'
export const MP4_AUDIO = 'audio/mp4'

export const defaultContentType: Record<MediaKind, string> = {
  video: MP4_VIDEO,
  audio: MP4_AUDIO,
}

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

// Upstream response headers copied onto proxied responses
export const forwardedHeaders = [
  'content-type',
  'content-length',
  'content-range',
  'accept-ranges',
] as const

export const MAX_PREFERRED_HEIGHT = 720

export const streamableVideoContainers = ['mp4']
export const streamableAudioContainers = ['m4a', 'mp4', 'webm']
export const PREFERRED_AUDIO_CONTAINER = 'm4a'
