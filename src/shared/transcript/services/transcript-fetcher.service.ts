import { Injectable, Logger } from '@nestjs/common';
import { TranscriptFetcherConfig } from '@/shared/config/pipeline.config';
import { ProxyPoolService } from '@/shared/proxy/services/proxy-pool.service';
import { ProxyHandle } from '@/shared/proxy/interfaces/proxy.interface';
import {
  FailureKind,
  FetchAttempt,
  ITranscriptClient,
  TrackLookup,
  TranscriptFetchOutcome,
} from '@/shared/transcript/interfaces/transcript.interface';
import { TranscriptConfigError } from '@/shared/transcript/errors/transcript.errors';
import { TranscriptCacheService } from './transcript-cache.service';
import { RetryPolicyService } from './retry-policy.service';
import { Clock } from '@/shared/lib/clock';
import { errorMessage } from '@/shared/lib/util';

/**
 * Cache-first transcript acquisition with proxy rotation and classified retries.
 *
 * Per content id: cache lookup, then up to `maxAttempts` network attempts.
 * Blocked attempts rotate to another proxy without waiting; rate-limited and
 * transient attempts sleep per RetryPolicy. Every expected outcome is a value.
 */
@Injectable()
export class TranscriptFetcherService {
  private readonly logger = new Logger(TranscriptFetcherService.name);

  constructor(
    private readonly config: TranscriptFetcherConfig,
    private readonly client: ITranscriptClient,
    private readonly proxyPool: ProxyPoolService,
    private readonly cache: TranscriptCacheService,
    private readonly retryPolicy: RetryPolicyService,
    private readonly clock: Clock,
  ) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new TranscriptConfigError(
        `maxAttempts must be a positive integer, got ${config.maxAttempts}`,
      );
    }
    if (config.languages.length === 0 && !config.allowAnyLanguage) {
      throw new TranscriptConfigError(
        'No transcript languages configured and any-language fallback is off',
      );
    }
  }

  /**
   * Transcript text, or null when none exists or every attempt failed.
   */
  async fetchTranscript(contentId: string): Promise<string | null> {
    const outcome = await this.fetchWithReport(contentId);
    return outcome.text;
  }

  async fetchWithReport(contentId: string): Promise<TranscriptFetchOutcome> {
    const cached = this.cache.get(contentId);
    if (cached !== null) {
      return { contentId, text: cached, source: 'cache', attempts: [] };
    }

    const attempts: FetchAttempt[] = [];
    const { maxAttempts } = this.config;

    for (let attemptIndex = 0; attemptIndex < maxAttempts; attemptIndex++) {
      const proxy = this.config.rotationEnabled
        ? this.proxyPool.nextProxy()
        : null;
      const attempt: FetchAttempt = {
        contentId,
        attemptIndex,
        proxyId: proxy?.id,
      };
      attempts.push(attempt);

      const lookup = await this.retrieve(contentId, proxy);

      if (lookup.status === 'found') {
        this.cache.set(contentId, lookup.text);
        if (proxy) this.proxyPool.reportSuccess(proxy);
        this.logger.log(
          `Fetched transcript for ${contentId} (${lookup.languageCode}, attempt ${attemptIndex + 1}/${maxAttempts})`,
        );
        return { contentId, text: lookup.text, source: 'network', attempts };
      }

      if (lookup.status === 'absent') {
        this.logger.log(`No transcript for ${contentId}: ${lookup.reason}`);
        return { contentId, text: null, source: 'absent', attempts };
      }

      if (lookup.status === 'language-not-found') {
        this.logger.log(
          `No transcript for ${contentId} in [${lookup.requested.join(', ')}]; available: [${lookup.available.join(', ')}]`,
        );
        return { contentId, text: null, source: 'absent', attempts };
      }

      const kind = this.retryPolicy.classify(lookup.error);
      attempt.failureKind = kind;
      this.logger.warn(
        `Transcript fetch failed for ${contentId} (attempt ${attemptIndex + 1}/${maxAttempts}, kind: ${kind}, via: ${this.describe(proxy)}): ${errorMessage(lookup.error)}`,
      );

      if (!this.retryPolicy.isRetryable(kind)) {
        return { contentId, text: null, source: 'absent', attempts };
      }

      if (kind === FailureKind.BLOCKED) {
        if (proxy) this.proxyPool.reportFailure(proxy);
        if (!proxy || !this.proxyPool.hasAlternativeTo(proxy)) {
          this.logger.error(
            `Giving up on ${contentId}: blocked with no other proxy to rotate to`,
          );
          return { contentId, text: null, source: 'exhausted', attempts };
        }
        continue;
      }

      if (kind === FailureKind.RATE_LIMITED && proxy) {
        this.proxyPool.reportFailure(proxy);
      }

      const waitMs = this.retryPolicy.waitTime(
        attemptIndex,
        kind,
        this.retryPolicy.retryAfterHint(lookup.error),
      );
      this.logger.debug(`Waiting ${waitMs}ms before the next attempt for ${contentId}`);
      await this.clock.sleep(waitMs);
    }

    this.logger.error(
      `Failed to fetch transcript for ${contentId} after ${maxAttempts} attempts`,
    );
    return { contentId, text: null, source: 'exhausted', attempts };
  }

  /**
   * A client that throws instead of returning a lookup is treated as a failed
   * attempt, so a network library error still goes through classification.
   */
  private async retrieve(
    contentId: string,
    proxy: ProxyHandle | null,
  ): Promise<TrackLookup> {
    try {
      return await this.client.retrieve(contentId, {
        languages: this.config.languages,
        allowAnyLanguage: this.config.allowAnyLanguage,
        proxy,
      });
    } catch (error) {
      return { status: 'failed', error };
    }
  }

  private describe(proxy: ProxyHandle | null): string {
    return proxy ? `${proxy.host}:${proxy.port}` : 'direct';
  }
}
