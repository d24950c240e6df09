import { ProxyHandle } from '@/shared/proxy/interfaces/proxy.interface';

export enum FailureKind {
  /** No transcript exists, or transcripts are disabled. Terminal, not an error. */
  ABSENT = 'absent',
  BLOCKED = 'blocked',
  RATE_LIMITED = 'rate_limited',
  TRANSIENT = 'transient',
}

/**
 * Outcome of one language-prioritized retrieval. Language fallbacks happen
 * inside a single lookup and never count as attempts.
 */
export type TrackLookup =
  | { status: 'found'; text: string; languageCode: string; generated: boolean }
  | { status: 'language-not-found'; requested: string[]; available: string[] }
  | { status: 'absent'; reason: string }
  | { status: 'failed'; error: unknown };

export interface RetrieveOptions {
  languages: string[];
  allowAnyLanguage: boolean;
  /** Null means a direct request. */
  proxy: ProxyHandle | null;
}

export interface ITranscriptClient {
  retrieve(contentId: string, options: RetrieveOptions): Promise<TrackLookup>;
}

export const TRANSCRIPT_CLIENT = 'TRANSCRIPT_CLIENT';

export interface FetchAttempt {
  contentId: string;
  attemptIndex: number;
  proxyId?: string;
  failureKind?: FailureKind;
}

export type FetchOutcomeSource = 'cache' | 'network' | 'absent' | 'exhausted';

export interface TranscriptFetchOutcome {
  contentId: string;
  text: string | null;
  source: FetchOutcomeSource;
  attempts: FetchAttempt[];
}

/** Persisted shape: one JSON object keyed by content id. */
export interface CacheEntry {
  transcript: string;
  /** ISO-8601 */
  timestamp: string;
}

export interface TranscriptCacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  cacheFile: string;
}
