import { ConfigService } from '@nestjs/config';
import { DAY_MS, MINUTE_MS } from '@/shared/lib/clock';

export interface ProxyPoolConfig {
  failureThreshold: number;
  disableDurationMs: number;
  shuffle: boolean;
}

export interface ProxySourceConfig {
  listFile: string;
  webshareToken?: string;
}

export interface TranscriptCacheConfig {
  cacheDir: string;
  expiryMs: number;
}

export interface RetryPolicyConfig {
  baseDelayMs: number;
  backoffFactor: number;
  rateLimitWaitMs: number;
}

export interface TranscriptFetcherConfig {
  maxAttempts: number;
  /** Ordered preference, e.g. ['ja', 'en']. */
  languages: string[];
  allowAnyLanguage: boolean;
  rotationEnabled: boolean;
}

export interface TranscriptClientConfig {
  cookiesFile?: string;
  timeoutMs: number;
}

export interface VideoCatalogConfig {
  apiKey: string;
  /** Uploads shorter than this are Shorts and skipped */
  minDurationSeconds: number;
  timeoutMs: number;
}

export interface DigestConfig {
  channelIdsFile: string;
  fallbackChannelIds: string[];
  processedVideosFile: string;
  recipients: string[];
  topic: string;
  maxVideos: number;
  interItemDelayMs: number;
  lookbackHours: number;
}

export interface PipelineConfig {
  proxyPool: ProxyPoolConfig;
  proxySource: ProxySourceConfig;
  cache: TranscriptCacheConfig;
  retry: RetryPolicyConfig;
  fetcher: TranscriptFetcherConfig;
  client: TranscriptClientConfig;
  catalog: VideoCatalogConfig;
  digest: DigestConfig;
}

export const PIPELINE_CONFIG = 'PIPELINE_CONFIG';

export const DEFAULT_PROXY_POOL_CONFIG: ProxyPoolConfig = {
  failureThreshold: 3,
  disableDurationMs: 30 * MINUTE_MS,
  shuffle: true,
};

export const DEFAULT_CACHE_CONFIG: TranscriptCacheConfig = {
  cacheDir: '.cache',
  expiryMs: 7 * DAY_MS,
};

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
  baseDelayMs: 5_000,
  backoffFactor: 2,
  rateLimitWaitMs: 60_000,
};

export const DEFAULT_FETCHER_CONFIG: TranscriptFetcherConfig = {
  maxAttempts: 3,
  languages: ['ja', 'en'],
  allowAnyLanguage: true,
  rotationEnabled: true,
};

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Map validated env values onto the per-component config structs.
 */
export function buildPipelineConfig(
  configService: ConfigService,
): PipelineConfig {
  return {
    proxyPool: {
      failureThreshold: configService.get<number>(
        'PROXY_FAILURE_THRESHOLD',
        DEFAULT_PROXY_POOL_CONFIG.failureThreshold,
      ),
      disableDurationMs:
        configService.get<number>('PROXY_DISABLE_MINUTES', 30) * MINUTE_MS,
      shuffle: configService.get<boolean>('PROXY_SHUFFLE', true),
    },
    proxySource: {
      listFile: configService.get<string>('PROXY_LIST_FILE', 'proxy_list.txt'),
      webshareToken: configService.get<string>('WEBSHARE_API_TOKEN'),
    },
    cache: {
      cacheDir: configService.get<string>(
        'CACHE_DIR',
        DEFAULT_CACHE_CONFIG.cacheDir,
      ),
      expiryMs: configService.get<number>('CACHE_EXPIRY_DAYS', 7) * DAY_MS,
    },
    retry: {
      baseDelayMs:
        configService.get<number>('RETRY_BASE_DELAY_SECONDS', 5) * 1000,
      backoffFactor: configService.get<number>(
        'BACKOFF_FACTOR',
        DEFAULT_RETRY_CONFIG.backoffFactor,
      ),
      rateLimitWaitMs:
        configService.get<number>('RATE_LIMIT_WAIT_SECONDS', 60) * 1000,
    },
    fetcher: {
      maxAttempts: configService.get<number>(
        'MAX_RETRIES',
        DEFAULT_FETCHER_CONFIG.maxAttempts,
      ),
      languages: splitList(
        configService.get<string>('TRANSCRIPT_LANGUAGES', 'ja,en'),
      ),
      allowAnyLanguage: configService.get<boolean>(
        'TRANSCRIPT_ANY_LANGUAGE_FALLBACK',
        true,
      ),
      rotationEnabled: configService.get<boolean>(
        'PROXY_ROTATION_ENABLED',
        true,
      ),
    },
    client: {
      cookiesFile: configService.get<string>('COOKIES_FILE'),
      timeoutMs: configService.get<number>('HTTP_TIMEOUT_MS', 30000),
    },
    catalog: {
      apiKey: configService.get<string>('YOUTUBE_API_KEY', ''),
      minDurationSeconds: configService.get<number>(
        'MIN_VIDEO_DURATION_SECONDS',
        61,
      ),
      timeoutMs: configService.get<number>('HTTP_TIMEOUT_MS', 30000),
    },
    digest: {
      channelIdsFile: configService.get<string>(
        'CHANNEL_IDS_FILE',
        'channel_ids.txt',
      ),
      fallbackChannelIds: splitList(
        configService.get<string>('TARGET_CHANNEL_IDS'),
      ),
      processedVideosFile: configService.get<string>(
        'PROCESSED_VIDEOS_FILE',
        'processed_videos.txt',
      ),
      recipients: splitList(configService.get<string>('EMAIL_RECIPIENT')),
      topic: configService.get<string>('DIGEST_TOPIC', 'generative AI'),
      maxVideos: configService.get<number>('MAX_VIDEOS', 50),
      interItemDelayMs:
        configService.get<number>('INTER_VIDEO_DELAY_SECONDS', 5) * 1000,
      lookbackHours: configService.get<number>('LOOKBACK_HOURS', 24),
    },
  };
}
