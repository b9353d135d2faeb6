import { pipe } from 'fp-ts/lib/function'

import { D, E } from '@/lib/fp'
import type { CandidateFormat, ExtractionResult } from '@/types'
import { ExtractionFailedError } from '@/types/errors'

const optionalString = D.nullable(D.string)
const optionalNumber = D.nullable(D.number)

export const formatDecoder = pipe(
  D.struct({
    format_id: D.string,
  }),
  D.intersect(
    D.partial({
      ext: optionalString,
      vcodec: optionalString,
      acodec: optionalString,
      width: optionalNumber,
      height: optionalNumber,
      fps: optionalNumber,
      abr: optionalNumber,
      url: optionalString,
      filesize: optionalNumber,
      filesize_approx: optionalNumber,
      format_note: optionalString,
    }),
  ),
)

export const infoDecoder = pipe(
  D.struct({
    id: D.string,
  }),
  D.intersect(
    D.partial({
      title: optionalString,
      description: optionalString,
      thumbnail: optionalString,
      duration: optionalNumber,
      view_count: optionalNumber,
      channel_id: optionalString,
      channel: optionalString,
      upload_date: optionalString,
      formats: D.nullable(D.array(D.UnknownRecord)),
    }),
  ),
)

const orUndefined = <T>(value: T | null | undefined) => value ?? undefined

const toCandidate = (raw: D.TypeOf<typeof formatDecoder>): CandidateFormat => ({
  formatId: raw.format_id,
  ext: raw.ext ?? '',
  videoCodec: orUndefined(raw.vcodec),
  audioCodec: orUndefined(raw.acodec),
  width: orUndefined(raw.width),
  height: orUndefined(raw.height),
  fps: orUndefined(raw.fps),
  audioBitrate: orUndefined(raw.abr),
  url: orUndefined(raw.url),
  filesize: raw.filesize ?? raw.filesize_approx ?? undefined,
  note: orUndefined(raw.format_note),
})

/**
 * Decodes the tool's `--dump-single-json` output. Formats that do not decode
 * are skipped; a document that does not decode is an extraction failure.
 */
export const parseExtraction = (stdout: string): ExtractionResult => {
  let json: unknown
  try {
    json = JSON.parse(stdout)
  } catch (err) {
    throw new ExtractionFailedError('malformed', err)
  }

  const decoded = infoDecoder.decode(json)
  if (E.isLeft(decoded)) {
    throw new ExtractionFailedError('malformed', D.draw(decoded.left))
  }
  const info = decoded.right

  const formats = (info.formats ?? []).flatMap((f) => {
    const format = formatDecoder.decode(f)
    return E.isRight(format) ? [toCandidate(format.right)] : []
  })

  return {
    videoId: info.id,
    title: info.title ?? '',
    thumbnailUrl: info.thumbnail ?? '',
    durationSeconds: info.duration ?? 0,
    details: {
      description: info.description ?? '',
      channelId: info.channel_id ?? '',
      channelTitle: info.channel ?? '',
      uploadDate: info.upload_date ?? '',
      viewCount: info.view_count ?? 0,
    },
    formats,
  }
}
