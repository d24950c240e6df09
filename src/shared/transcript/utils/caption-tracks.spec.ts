import {
  CaptionTrack,
  extractCaptionTracks,
  parseTimedText,
  selectCaptionTrack,
} from './caption-tracks';

const track = (
  languageCode: string,
  generated: boolean,
): CaptionTrack => ({
  baseUrl: `https://www.youtube.com/api/timedtext?lang=${languageCode}`,
  languageCode,
  name: languageCode,
  generated,
});

describe('extractCaptionTracks', () => {
  it('reads tracks from the player response', () => {
    const player = {
      captions: {
        playerCaptionsTracklistRenderer: {
          captionTracks: [
            {
              baseUrl: 'https://www.youtube.com/api/timedtext?v=abc&lang=en&fmt=srv3',
              languageCode: 'en',
              name: { simpleText: 'English' },
            },
            {
              baseUrl: 'https://www.youtube.com/api/timedtext?v=abc&lang=ja&kind=asr',
              languageCode: 'ja',
              kind: 'asr',
              name: { runs: [{ text: '日本語' }, { text: ' (自動生成)' }] },
            },
            { languageCode: 'de' },
          ],
        },
      },
    };

    expect(extractCaptionTracks(player)).toEqual([
      {
        baseUrl: 'https://www.youtube.com/api/timedtext?v=abc&lang=en',
        languageCode: 'en',
        name: 'English',
        generated: false,
      },
      {
        baseUrl: 'https://www.youtube.com/api/timedtext?v=abc&lang=ja&kind=asr',
        languageCode: 'ja',
        name: '日本語 (自動生成)',
        generated: true,
      },
    ]);
  });

  it('returns nothing when captions are missing', () => {
    expect(extractCaptionTracks({ playabilityStatus: { status: 'OK' } })).toEqual([]);
    expect(extractCaptionTracks(null)).toEqual([]);
  });
});

describe('selectCaptionTrack', () => {
  const tracks = [track('en', true), track('ja', false), track('de', false)];

  it('walks the preferred languages in order', () => {
    expect(selectCaptionTrack(tracks, ['ja', 'en'], false)).toBe(tracks[1]);
    expect(selectCaptionTrack(tracks, ['en', 'ja'], false)).toBe(tracks[0]);
  });

  it('prefers a manual track over a generated one in the same language', () => {
    const both = [track('en', true), track('en', false)];
    expect(selectCaptionTrack(both, ['en'], false)).toBe(both[1]);
  });

  it('falls back to the first manual track when any language is allowed', () => {
    expect(selectCaptionTrack(tracks, ['fr'], true)).toBe(tracks[1]);
  });

  it('falls back to a generated track when nothing else exists', () => {
    const generated = [track('ko', true)];
    expect(selectCaptionTrack(generated, ['fr'], true)).toBe(generated[0]);
  });

  it('returns null without the fallback', () => {
    expect(selectCaptionTrack(tracks, ['fr'], false)).toBeNull();
  });
});

describe('parseTimedText', () => {
  it('decodes, strips markup and joins segments with spaces', () => {
    const xml = [
      '<?xml version="1.0" encoding="utf-8" ?>',
      '<transcript>',
      '<text start="0" dur="1.5">Hello &amp;amp; welcome</text>',
      '<text start="1.5" dur="2">it&amp;#39;s   a &lt;b&gt;test&lt;/b&gt;</text>',
      '<text start="3.5" dur="1"> </text>',
      '</transcript>',
    ].join('');

    expect(parseTimedText(xml)).toBe("Hello & welcome it's a test");
  });

  it('returns an empty string for a track without segments', () => {
    expect(parseTimedText('<transcript></transcript>')).toBe('');
  });
});
