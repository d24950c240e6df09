import {
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { Dispatcher, ProxyAgent, request } from 'undici';
import { TranscriptClientConfig } from '@/shared/config/pipeline.config';
import { ProxyHandle } from '@/shared/proxy/interfaces/proxy.interface';
import {
  ITranscriptClient,
  RetrieveOptions,
  TrackLookup,
} from '@/shared/transcript/interfaces/transcript.interface';
import { TranscriptRequestError } from '@/shared/transcript/errors/transcript.errors';
import {
  extractCaptionTracks,
  parseTimedText,
  selectCaptionTrack,
} from '@/shared/transcript/utils/caption-tracks';
import {
  cookieHeaderFor,
  JarCookie,
  loadCookieJar,
} from '@/shared/transcript/utils/cookie-jar';
import { Clock } from '@/shared/lib/clock';
import { errorMessage, isRecord } from '@/shared/lib/util';

export const YOUTUBE_ORIGIN = 'https://www.youtube.com';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36';

const INNERTUBE_CONTEXT = {
  client: {
    clientName: 'ANDROID',
    clientVersion: '20.10.38',
  },
};

const CONSENT_FORM_MARKER = 'action="https://consent.youtube.com/s"';
const RECAPTCHA_MARKER = 'class="g-recaptcha"';

type PlayabilityVerdict =
  | { kind: 'ok' }
  | { kind: 'blocked'; reason: string }
  | { kind: 'absent'; reason: string };

export type DispatcherResolver = (
  proxy: ProxyHandle | null,
) => Dispatcher | undefined;

function parseRetryAfter(
  header: string | string[] | undefined,
): number | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function describeStatus(statusCode: number): string {
  if (statusCode === 403) return 'HTTP Error: 403 Forbidden';
  if (statusCode === 429) return 'HTTP Error: 429 Too Many Requests';
  return `HTTP Error: ${statusCode}`;
}

/**
 * Reads the playabilityStatus block of a player response.
 */
export function assessPlayability(player: unknown): PlayabilityVerdict {
  if (!isRecord(player) || !isRecord(player.playabilityStatus)) {
    return { kind: 'ok' };
  }

  const { status, reason } = player.playabilityStatus;
  if (status === 'OK' || status === undefined) return { kind: 'ok' };

  const text = typeof reason === 'string' ? reason : String(status);
  if (status === 'LOGIN_REQUIRED' && /not a bot/i.test(text)) {
    return {
      kind: 'blocked',
      reason: `YouTube is blocking requests from this IP: ${text}`,
    };
  }
  return { kind: 'absent', reason: `Video is not playable (${status}): ${text}` };
}

/**
 * Transcript retrieval against YouTube's watch page and innertube player API.
 *
 * One retrieve() call makes the full round: watch page, player response,
 * caption track choice, timed-text download. Every failure comes back as a
 * `failed` lookup; classification is the caller's job.
 */
@Injectable()
export class YoutubeTranscriptClient
  implements ITranscriptClient, OnModuleDestroy
{
  private readonly logger = new Logger(YoutubeTranscriptClient.name);
  private readonly agents = new Map<string, ProxyAgent>();
  private readonly cookies: JarCookie[];
  private readonly resolveDispatcher: DispatcherResolver;

  constructor(
    private readonly config: TranscriptClientConfig,
    private readonly clock: Clock,
    resolveDispatcher?: DispatcherResolver,
  ) {
    this.cookies = loadCookieJar(config.cookiesFile);
    this.resolveDispatcher =
      resolveDispatcher ?? ((proxy) => (proxy ? this.agentFor(proxy) : undefined));
  }

  async onModuleDestroy() {
    for (const [id, agent] of this.agents.entries()) {
      try {
        await agent.close();
      } catch (error) {
        this.logger.error(
          `Failed to close proxy agent ${id}: ${errorMessage(error)}`,
        );
      }
    }
    this.agents.clear();
  }

  async retrieve(
    contentId: string,
    options: RetrieveOptions,
  ): Promise<TrackLookup> {
    const dispatcher = this.resolveDispatcher(options.proxy);
    const via = options.proxy
      ? `${options.proxy.host}:${options.proxy.port}`
      : 'direct';

    try {
      this.logger.debug(`Retrieving transcript for ${contentId} via ${via}`);

      const html = await this.fetchWatchPage(contentId, dispatcher);
      const apiKey = this.extractApiKey(html);

      const player = await this.fetchPlayer(contentId, apiKey, dispatcher);
      const verdict = assessPlayability(player);
      if (verdict.kind === 'blocked') {
        throw new TranscriptRequestError(verdict.reason);
      }
      if (verdict.kind === 'absent') {
        return { status: 'absent', reason: verdict.reason };
      }

      const tracks = extractCaptionTracks(player);
      if (tracks.length === 0) {
        return {
          status: 'absent',
          reason: 'Transcripts are disabled for this video',
        };
      }

      const track = selectCaptionTrack(
        tracks,
        options.languages,
        options.allowAnyLanguage,
      );
      if (!track) {
        return {
          status: 'language-not-found',
          requested: options.languages,
          available: tracks.map((t) => t.languageCode),
        };
      }

      const xml = await this.send(track.baseUrl, { method: 'GET' }, dispatcher);
      const text = parseTimedText(xml);
      if (!text) {
        return { status: 'absent', reason: 'Transcript track is empty' };
      }

      this.logger.debug(
        `Transcript for ${contentId}: ${text.length} chars (${track.languageCode}${track.generated ? ', generated' : ''})`,
      );
      return {
        status: 'found',
        text,
        languageCode: track.languageCode,
        generated: track.generated,
      };
    } catch (error) {
      return { status: 'failed', error };
    }
  }

  private async fetchWatchPage(
    contentId: string,
    dispatcher: Dispatcher | undefined,
  ): Promise<string> {
    const url = `${YOUTUBE_ORIGIN}/watch?v=${encodeURIComponent(contentId)}`;
    let extraCookie = '';
    let html = await this.send(url, { method: 'GET' }, dispatcher);

    if (html.includes(CONSENT_FORM_MARKER)) {
      const match = html.match(/name="v" value="(.*?)"/);
      if (!match) {
        throw new TranscriptRequestError('Failed to answer the consent page');
      }
      extraCookie = `CONSENT=YES+${match[1]}`;
      html = await this.send(url, { method: 'GET', extraCookie }, dispatcher);
      if (html.includes(CONSENT_FORM_MARKER)) {
        throw new TranscriptRequestError('Failed to answer the consent page');
      }
    }

    if (html.includes(RECAPTCHA_MARKER)) {
      throw new TranscriptRequestError(
        'YouTube is blocking requests from this IP (reCAPTCHA challenge). Requests from cloud provider IPs are commonly blocked.',
        429,
      );
    }

    return html;
  }

  private extractApiKey(html: string): string {
    const match = html.match(/"INNERTUBE_API_KEY":\s*"([a-zA-Z0-9_-]+)"/);
    if (!match) {
      throw new TranscriptRequestError(
        'Could not find INNERTUBE_API_KEY in the watch page',
      );
    }
    return match[1];
  }

  private async fetchPlayer(
    contentId: string,
    apiKey: string,
    dispatcher: Dispatcher | undefined,
  ): Promise<unknown> {
    const body = await this.send(
      `${YOUTUBE_ORIGIN}/youtubei/v1/player?key=${apiKey}`,
      {
        method: 'POST',
        body: JSON.stringify({ context: INNERTUBE_CONTEXT, videoId: contentId }),
      },
      dispatcher,
    );

    try {
      return JSON.parse(body);
    } catch (error) {
      throw new TranscriptRequestError(
        `Invalid player response: ${errorMessage(error)}`,
      );
    }
  }

  private async send(
    url: string,
    init: { method: 'GET' | 'POST'; body?: string; extraCookie?: string },
    dispatcher: Dispatcher | undefined,
  ): Promise<string> {
    const headers: Record<string, string> = {
      'User-Agent': USER_AGENT,
      'Accept-Language': 'en-US',
    };
    const cookie = [
      cookieHeaderFor(this.cookies, 'youtube.com', this.clock.now()),
      init.extraCookie ?? '',
    ]
      .filter((part) => part.length > 0)
      .join('; ');
    if (cookie) headers.Cookie = cookie;
    if (init.body) headers['Content-Type'] = 'application/json';

    const response = await request(url, {
      method: init.method,
      headers,
      body: init.body,
      dispatcher,
      headersTimeout: this.config.timeoutMs,
      bodyTimeout: this.config.timeoutMs,
    });
    const text = await response.body.text();

    if (response.statusCode >= 400) {
      throw new TranscriptRequestError(
        describeStatus(response.statusCode),
        response.statusCode,
        parseRetryAfter(response.headers['retry-after']),
      );
    }
    return text;
  }

  private agentFor(proxy: ProxyHandle): ProxyAgent {
    let agent = this.agents.get(proxy.id);
    if (!agent) {
      const credentials =
        proxy.username || proxy.password
          ? `Basic ${Buffer.from(`${proxy.username}:${proxy.password}`).toString('base64')}`
          : undefined;
      agent = new ProxyAgent({
        uri: `http://${proxy.host}:${proxy.port}`,
        token: credentials,
      });
      this.agents.set(proxy.id, agent);
    }
    return agent;
  }
}
