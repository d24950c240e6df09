import fs from 'fs';
import path from 'path';
import { Injectable, Logger } from '@nestjs/common';
import { TranscriptCacheConfig } from '@/shared/config/pipeline.config';
import {
  CacheEntry,
  TranscriptCacheStats,
} from '@/shared/transcript/interfaces/transcript.interface';
import { Clock } from '@/shared/lib/clock';
import { errorMessage } from '@/shared/lib/util';

export const CACHE_FILE_NAME = 'transcripts.json';

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'transcript' in value &&
    'timestamp' in value &&
    typeof value.transcript === 'string' &&
    typeof value.timestamp === 'string' &&
    !Number.isNaN(Date.parse(value.timestamp))
  );
}

/**
 * File-backed transcript cache with a fixed expiry window.
 *
 * Write-through: every mutation rewrites the JSON file before returning.
 * Expired entries are evicted lazily on lookup or in bulk by cleanup().
 * Single writer per run; there is no cross-process locking.
 */
@Injectable()
export class TranscriptCacheService {
  private readonly logger = new Logger(TranscriptCacheService.name);
  private readonly cacheFile: string;
  private cache = new Map<string, CacheEntry>();

  constructor(
    private readonly config: TranscriptCacheConfig,
    private readonly clock: Clock,
  ) {
    this.cacheFile = path.join(config.cacheDir, CACHE_FILE_NAME);
    if (this.ensureCacheDir()) {
      this.load();
    }
  }

  get(contentId: string): string | null {
    const entry = this.cache.get(contentId);
    if (!entry) {
      this.logger.debug(`Cache miss for ${contentId}`);
      return null;
    }

    if (this.isExpired(entry)) {
      this.logger.log(`Cache expired for ${contentId}`);
      this.cache.delete(contentId);
      this.save();
      return null;
    }

    this.logger.log(`Cache hit for ${contentId}`);
    return entry.transcript;
  }

  set(contentId: string, transcript: string): void {
    this.cache.set(contentId, {
      transcript,
      timestamp: this.clock.now().toISOString(),
    });
    this.save();
    this.logger.log(`Cached transcript for ${contentId}`);
  }

  /**
   * Remove every expired entry. Returns the number removed.
   */
  cleanup(): number {
    let removed = 0;
    for (const [contentId, entry] of this.cache) {
      if (this.isExpired(entry)) {
        this.cache.delete(contentId);
        removed++;
      }
    }

    if (removed > 0) {
      this.save();
      this.logger.log(`Cleaned up ${removed} expired cache entries`);
    }
    return removed;
  }

  clear(): void {
    this.cache.clear();
    this.save();
    this.logger.log('Cleared all cache entries');
  }

  stats(): TranscriptCacheStats {
    let expiredEntries = 0;
    for (const entry of this.cache.values()) {
      if (this.isExpired(entry)) expiredEntries++;
    }

    return {
      totalEntries: this.cache.size,
      validEntries: this.cache.size - expiredEntries,
      expiredEntries,
      cacheFile: this.cacheFile,
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    const age = this.clock.now().getTime() - Date.parse(entry.timestamp);
    return age >= this.config.expiryMs;
  }

  private ensureCacheDir(): boolean {
    try {
      fs.mkdirSync(this.config.cacheDir, { recursive: true });
      return true;
    } catch (error) {
      this.logger.warn(
        `Cache directory ${this.config.cacheDir} is not usable: ${errorMessage(error)}. Starting with an empty cache.`,
      );
      return false;
    }
  }

  private load(): void {
    if (!fs.existsSync(this.cacheFile)) {
      this.logger.log('Created new transcript cache');
      return;
    }

    try {
      const parsed: unknown = JSON.parse(
        fs.readFileSync(this.cacheFile, 'utf-8'),
      );
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('cache file is not a JSON object');
      }

      let skipped = 0;
      for (const [contentId, value] of Object.entries(parsed)) {
        if (isCacheEntry(value)) {
          this.cache.set(contentId, {
            transcript: value.transcript,
            timestamp: value.timestamp,
          });
        } else {
          skipped++;
        }
      }

      if (skipped > 0) {
        this.logger.warn(`Skipped ${skipped} malformed cache entries`);
      }
      this.logger.log(`Loaded transcript cache with ${this.cache.size} entries`);
    } catch (error) {
      this.logger.warn(
        `Failed to load cache file ${this.cacheFile}: ${errorMessage(error)}. Starting with an empty cache.`,
      );
      this.cache = new Map();
    }
  }

  // Temp file, then rename over the real one
  private save(): void {
    const tmpFile = `${this.cacheFile}.tmp`;
    try {
      fs.writeFileSync(
        tmpFile,
        JSON.stringify(Object.fromEntries(this.cache), null, 2),
        'utf-8',
      );
      fs.renameSync(tmpFile, this.cacheFile);
      this.logger.debug(`Saved transcript cache with ${this.cache.size} entries`);
    } catch (error) {
      this.logger.error(
        `Failed to save cache file ${this.cacheFile}: ${errorMessage(error)}`,
      );
    }
  }
}
