export type MediaKind = 'video' | 'audio'

export type StreamRequestKind = MediaKind | 'both'

// One entry of the extraction tool's format list
export interface CandidateFormat {
  formatId: string
  ext: string
  // 'none' when the format carries no such track, undefined when unreported
  videoCodec?: string
  audioCodec?: string
  width?: number
  height?: number
  fps?: number
  audioBitrate?: number
  url?: string
  filesize?: number
  note?: string
}

// CandidateFormat without its upstream URL, safe to hand to clients
export type FormatSummary = Omit<CandidateFormat, 'url'>

export interface VideoDetails {
  description: string
  channelId: string
  channelTitle: string
  uploadDate: string
  viewCount: number
}

export interface ExtractionResult {
  videoId: string
  title: string
  thumbnailUrl: string
  durationSeconds: number
  details: VideoDetails
  formats: CandidateFormat[]
}

export interface ResolvedStream {
  videoId: string
  videoUrl: string | null
  audioUrl: string | null
  title: string
  thumbnailUrl: string
  durationSeconds: number
  details: VideoDetails
  formats: FormatSummary[]
  // ms since epoch
  resolvedAt: number
}

export interface StreamSelection {
  video: CandidateFormat | null
  audio: CandidateFormat | null
}

export interface StreamPayload {
  title: string
  duration: number
  thumbnailUrl: string
  videoUrl?: string | null
  audioUrl?: string | null
}

export interface StreamTokenParams {
  videoId: string
  kind: MediaKind
  exp?: string
  sig?: string
}

export type TokenVerdict = 'valid' | 'missing' | 'expired' | 'invalid'
