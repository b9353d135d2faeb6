import {
  MAX_PREFERRED_HEIGHT,
  PREFERRED_AUDIO_CONTAINER,
  streamableAudioContainers,
  streamableVideoContainers,
} from '@/consts'
import type {
  CandidateFormat,
  FormatSummary,
  StreamSelection,
} from '@/types'

// An unreported codec counts as present, only an explicit 'none' means absent
const hasVideo = (f: CandidateFormat) => f.videoCodec !== 'none'
const hasAudio = (f: CandidateFormat) => f.audioCodec !== 'none'

const isCombined = (f: CandidateFormat) => hasVideo(f) && hasAudio(f)

const byHeightDesc = (a: CandidateFormat, b: CandidateFormat) =>
  (b.height ?? 0) - (a.height ?? 0)

const byBitrateDesc = (a: CandidateFormat, b: CandidateFormat) =>
  (b.audioBitrate ?? 0) - (a.audioBitrate ?? 0)

/**
 * Highest format whose height is known and at most 720p, falling back to the
 * overall highest one.
 */
const pickPreferredHeight = (candidates: CandidateFormat[]) => {
  const sorted = [...candidates].sort(byHeightDesc)
  return (
    sorted.find(
      (f) => f.height !== undefined && f.height <= MAX_PREFERRED_HEIGHT,
    ) ??
    sorted[0] ??
    null
  )
}

export const selectVideo = (formats: CandidateFormat[]) => {
  const playable = formats.filter(
    (f) => f.url && hasVideo(f) && streamableVideoContainers.includes(f.ext),
  )
  return (
    pickPreferredHeight(playable.filter(isCombined)) ??
    pickPreferredHeight(playable.filter((f) => !hasAudio(f)))
  )
}

export const selectAudio = (formats: CandidateFormat[]) => {
  const audioOnly = formats
    .filter(
      (f) =>
        f.url &&
        !hasVideo(f) &&
        hasAudio(f) &&
        streamableAudioContainers.includes(f.ext),
    )
    .sort(byBitrateDesc)

  return (
    audioOnly.find((f) => f.ext === PREFERRED_AUDIO_CONTAINER) ??
    audioOnly[0] ??
    null
  )
}

/**
 * Picks the video and audio formats a client should play.
 *
 * When the upstream offers no audio-only format, a selected combined format
 * doubles as the audio stream, so clients always get an audio URL whenever a
 * combined stream exists. Audio-only listeners then download the video track
 * too.
 */
export const selectStreams = (formats: CandidateFormat[]): StreamSelection => {
  const video = selectVideo(formats)
  const audio = selectAudio(formats) ?? (video && isCombined(video) ? video : null)
  return { video, audio }
}

export const summarizeFormat = ({
  url: _url,
  ...summary
}: CandidateFormat): FormatSummary => summary
