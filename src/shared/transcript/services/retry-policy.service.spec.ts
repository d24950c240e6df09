import { RetryPolicyService } from './retry-policy.service';
import { FailureKind } from '@/shared/transcript/interfaces/transcript.interface';
import {
  TranscriptRequestError,
  TranscriptUnavailableError,
} from '@/shared/transcript/errors/transcript.errors';

describe('RetryPolicyService', () => {
  const policy = new RetryPolicyService({
    baseDelayMs: 5_000,
    backoffFactor: 2,
    rateLimitWaitMs: 60_000,
  });

  describe('classify', () => {
    it.each<[string, unknown, FailureKind]>([
      [
        'an unavailable error',
        new TranscriptUnavailableError('abc123', 'captions off'),
        FailureKind.ABSENT,
      ],
      [
        'a disabled-transcripts message',
        new Error('Transcripts are disabled for this video'),
        FailureKind.ABSENT,
      ],
      [
        'a no-transcript-found message',
        new Error('No transcripts were found for any of the requested language codes'),
        FailureKind.ABSENT,
      ],
      [
        'HTTP 403',
        new TranscriptRequestError('HTTP Error: 403 Forbidden', 403),
        FailureKind.BLOCKED,
      ],
      [
        'a cloud provider block',
        new Error('YouTube is blocking requests from your IP (cloud provider)'),
        FailureKind.BLOCKED,
      ],
      [
        'a bot check',
        new Error("Sign in to confirm you're not a bot"),
        FailureKind.BLOCKED,
      ],
      [
        'HTTP 429',
        new TranscriptRequestError('HTTP Error: 429 Too Many Requests', 429),
        FailureKind.RATE_LIMITED,
      ],
      ['a rate limit message', new Error('rate limit exceeded'), FailureKind.RATE_LIMITED],
      ['a timeout', new Error('Headers Timeout Error'), FailureKind.TRANSIENT],
      ['HTTP 500', new TranscriptRequestError('HTTP Error: 500', 500), FailureKind.TRANSIENT],
      ['a thrown string', 'socket hang up', FailureKind.TRANSIENT],
    ])('classifies %s', (_label, error, kind) => {
      expect(policy.classify(error)).toBe(kind);
    });

    it('checks blocking before rate limiting', () => {
      const error = new TranscriptRequestError(
        'YouTube is blocking requests from this IP (reCAPTCHA challenge)',
        429,
      );
      expect(policy.classify(error)).toBe(FailureKind.BLOCKED);
    });
  });

  it('treats only absence as non-retryable', () => {
    expect(policy.isRetryable(FailureKind.ABSENT)).toBe(false);
    expect(policy.isRetryable(FailureKind.BLOCKED)).toBe(true);
    expect(policy.isRetryable(FailureKind.RATE_LIMITED)).toBe(true);
    expect(policy.isRetryable(FailureKind.TRANSIENT)).toBe(true);
  });

  describe('waitTime', () => {
    it('backs off exponentially for transient failures', () => {
      expect(
        [0, 1, 2].map((i) => policy.waitTime(i, FailureKind.TRANSIENT)),
      ).toEqual([5_000, 10_000, 20_000]);
    });

    it('waits the fixed rate-limit delay regardless of attempt', () => {
      expect(policy.waitTime(0, FailureKind.RATE_LIMITED)).toBe(60_000);
      expect(policy.waitTime(3, FailureKind.RATE_LIMITED)).toBe(60_000);
    });

    it('prefers a server hint for rate limits', () => {
      expect(policy.waitTime(0, FailureKind.RATE_LIMITED, 7_000)).toBe(7_000);
    });

    it('never waits for blocked or absent', () => {
      expect(policy.waitTime(2, FailureKind.BLOCKED)).toBe(0);
      expect(policy.waitTime(2, FailureKind.ABSENT)).toBe(0);
    });
  });

  it('reads Retry-After from request errors in milliseconds', () => {
    expect(
      policy.retryAfterHint(new TranscriptRequestError('HTTP Error: 429', 429, 12)),
    ).toBe(12_000);
    expect(policy.retryAfterHint(new Error('HTTP Error: 429'))).toBeUndefined();
  });
});
