import * as cheerio from 'cheerio';
import { isRecord } from '@/shared/lib/util';

export interface CaptionTrack {
  baseUrl: string;
  languageCode: string;
  name: string;
  /** Auto-generated (ASR) rather than uploaded by the creator */
  generated: boolean;
}

function trackName(name: unknown): string {
  if (!isRecord(name)) return '';
  if (typeof name.simpleText === 'string') return name.simpleText;
  if (Array.isArray(name.runs)) {
    return name.runs
      .map((run) => (isRecord(run) && typeof run.text === 'string' ? run.text : ''))
      .join('');
  }
  return '';
}

/**
 * Caption tracks from an innertube player response. Empty when the response
 * carries no caption renderer, i.e. transcripts are disabled.
 */
export function extractCaptionTracks(player: unknown): CaptionTrack[] {
  if (!isRecord(player) || !isRecord(player.captions)) return [];
  const renderer = player.captions.playerCaptionsTracklistRenderer;
  if (!isRecord(renderer) || !Array.isArray(renderer.captionTracks)) return [];

  const tracks: CaptionTrack[] = [];
  for (const track of renderer.captionTracks) {
    if (!isRecord(track)) continue;
    if (typeof track.baseUrl !== 'string') continue;
    if (typeof track.languageCode !== 'string') continue;

    tracks.push({
      // srv3 has a different XML layout; the plain format is what we parse
      baseUrl: track.baseUrl.replace('&fmt=srv3', ''),
      languageCode: track.languageCode,
      name: trackName(track.name),
      generated: track.kind === 'asr',
    });
  }
  return tracks;
}

/**
 * Walk the preferred languages in order, taking a creator-uploaded track
 * before a generated one for each. With `allowAnyLanguage`, fall back to the
 * first uploaded track, then the first track of any kind.
 */
export function selectCaptionTrack(
  tracks: CaptionTrack[],
  languages: string[],
  allowAnyLanguage: boolean,
): CaptionTrack | null {
  for (const language of languages) {
    const manual = tracks.find(
      (track) => track.languageCode === language && !track.generated,
    );
    if (manual) return manual;

    const generated = tracks.find(
      (track) => track.languageCode === language && track.generated,
    );
    if (generated) return generated;
  }

  if (!allowAnyLanguage) return null;
  return tracks.find((track) => !track.generated) ?? tracks[0] ?? null;
}

/**
 * Flatten a timed-text document to one line of text. Segment bodies are
 * entity-escaped twice by the server, so each is decoded again as HTML,
 * which also drops inline formatting tags.
 */
export function parseTimedText(xml: string): string {
  const $ = cheerio.load(xml, { xml: true });

  return $('text, p')
    .toArray()
    .map((element) => {
      const once = $(element).text();
      return cheerio.load(once, null, false).text();
    })
    .map((segment) => segment.replace(/\s+/g, ' ').trim())
    .filter((segment) => segment.length > 0)
    .join(' ');
}
