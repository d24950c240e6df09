import {
  ITranscriptClient,
  RetrieveOptions,
  TrackLookup,
} from '@/shared/transcript/interfaces/transcript.interface';

export interface RecordedCall {
  contentId: string;
  proxyId: string | null;
}

/**
 * Plays back one scripted lookup per call; the last step repeats once the
 * script runs out. An Error step is thrown rather than returned.
 */
export class ScriptedTranscriptClient implements ITranscriptClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly script: Array<TrackLookup | Error>) {}

  async retrieve(
    contentId: string,
    options: RetrieveOptions,
  ): Promise<TrackLookup> {
    this.calls.push({ contentId, proxyId: options.proxy?.id ?? null });

    const step =
      this.script[Math.min(this.calls.length - 1, this.script.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  }
}

export const found = (text: string): TrackLookup => ({
  status: 'found',
  text,
  languageCode: 'en',
  generated: false,
});

export const failed = (error: unknown): TrackLookup => ({
  status: 'failed',
  error,
});
