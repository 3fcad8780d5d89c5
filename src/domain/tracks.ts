import { StructuralInputError } from "./errors";
import type { SubtitleTrack } from "./types";

export const IMAGE_SUBTITLE_CODECS = ["hdmv_pgs_subtitle", "dvd_subtitle", "dvb_subtitle", "xsub"];

export function isImageSubtitle(track: SubtitleTrack) {
  return IMAGE_SUBTITLE_CODECS.includes(track.codec);
}

/**
 * Picks the stream to translate: the requested one, or the first text-based stream.
 * Image-based streams cannot be extracted as text and are rejected.
 */
export function selectSubtitleTrack(tracks: SubtitleTrack[], requested: number | null): SubtitleTrack {
  if (!tracks.length) {
    throw new StructuralInputError("No subtitle tracks found in the file");
  }
  if (requested === null) {
    const track = tracks.find((candidate) => !isImageSubtitle(candidate));
    if (!track) {
      throw new StructuralInputError("No text-based subtitle tracks found");
    }
    return track;
  }
  const track = tracks.find((candidate) => candidate.index === requested);
  if (!track) {
    throw new StructuralInputError(`Subtitle track ${requested} not found`);
  }
  if (isImageSubtitle(track)) {
    throw new StructuralInputError(
      `Subtitle track ${requested} is a graphical subtitle (${track.codec}), text extraction not supported`
    );
  }
  return track;
}

export function hasLanguageTrack(tracks: SubtitleTrack[], languageCode: string) {
  return tracks.some((track) => track.language?.toLowerCase() === languageCode);
}
