import { Injectable } from '@nestjs/common';
import { RetryPolicyConfig } from '@/shared/config/pipeline.config';
import { FailureKind } from '@/shared/transcript/interfaces/transcript.interface';
import {
  TranscriptRequestError,
  TranscriptUnavailableError,
} from '@/shared/transcript/errors/transcript.errors';
import { errorMessage } from '@/shared/lib/util';

const ABSENT_PATTERNS = [
  /transcripts? (are|is) disabled/i,
  /no transcripts? (were |was )?found/i,
];

const BLOCKING_PATTERNS = [
  /\bblock(ed|ing)\b/i,
  /cloud provider/i,
  /recaptcha/i,
  /not a bot/i,
  /\bforbidden\b/i,
  /\b403\b/,
];

const RATE_LIMIT_PATTERNS = [/\b429\b/, /too many requests/i, /rate limit/i];

function matchesAny(message: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(message));
}

/**
 * Maps a failure to a FailureKind and decides how long to wait before the
 * next attempt. Classification order is fixed: absent, blocked, rate limit,
 * then everything else is transient.
 */
@Injectable()
export class RetryPolicyService {
  constructor(private readonly config: RetryPolicyConfig) {}

  classify(error: unknown): FailureKind {
    if (error instanceof TranscriptUnavailableError) return FailureKind.ABSENT;

    const message = errorMessage(error);
    const statusCode =
      error instanceof TranscriptRequestError ? error.statusCode : undefined;

    if (matchesAny(message, ABSENT_PATTERNS)) return FailureKind.ABSENT;
    if (statusCode === 403 || matchesAny(message, BLOCKING_PATTERNS)) {
      return FailureKind.BLOCKED;
    }
    if (statusCode === 429 || matchesAny(message, RATE_LIMIT_PATTERNS)) {
      return FailureKind.RATE_LIMITED;
    }
    return FailureKind.TRANSIENT;
  }

  isRetryable(kind: FailureKind): boolean {
    return kind !== FailureKind.ABSENT;
  }

  /**
   * Milliseconds to wait after a failure at `attemptIndex` (0-based).
   * Blocked failures never wait: rotating to another proxy is the mitigation.
   */
  waitTime(
    attemptIndex: number,
    kind: FailureKind,
    retryAfterHintMs?: number,
  ): number {
    switch (kind) {
      case FailureKind.ABSENT:
      case FailureKind.BLOCKED:
        return 0;
      case FailureKind.RATE_LIMITED:
        return retryAfterHintMs ?? this.config.rateLimitWaitMs;
      case FailureKind.TRANSIENT:
        return (
          this.config.baseDelayMs *
          Math.pow(this.config.backoffFactor, attemptIndex)
        );
    }
  }

  /**
   * Server-provided Retry-After, in milliseconds, when the failure carries one.
   */
  retryAfterHint(error: unknown): number | undefined {
    if (
      error instanceof TranscriptRequestError &&
      error.retryAfterSeconds !== undefined
    ) {
      return error.retryAfterSeconds * 1000;
    }
    return undefined;
  }
}
