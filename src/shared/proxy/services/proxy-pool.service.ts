import { Injectable, Logger } from '@nestjs/common';
import {
  IProxySource,
  ProxyEntry,
  ProxyHandle,
  ProxyPoolStats,
  ProxySeed,
} from '@/shared/proxy/interfaces/proxy.interface';
import { ProxyPoolConfig } from '@/shared/config/pipeline.config';
import { Clock } from '@/shared/lib/clock';

export function proxyUrl(seed: ProxySeed): string {
  if (seed.username || seed.password) {
    const user = encodeURIComponent(seed.username);
    const pass = encodeURIComponent(seed.password);
    return `http://${user}:${pass}@${seed.host}:${seed.port}`;
  }
  return `http://${seed.host}:${seed.port}`;
}

/**
 * Round-robin proxy rotation with temporary quarantine of failing proxies.
 *
 * The pool owns every ProxyEntry. Callers get a frozen ProxyHandle and report
 * outcomes by its id, so no caller can mutate counters directly.
 */
@Injectable()
export class ProxyPoolService {
  private readonly logger = new Logger(ProxyPoolService.name);
  private entries: ProxyEntry[] = [];
  private readonly byId = new Map<string, ProxyEntry>();
  private readonly handles = new Map<string, ProxyHandle>();
  private cursor = 0;

  constructor(
    private readonly config: ProxyPoolConfig,
    private readonly clock: Clock,
    private readonly random: () => number = Math.random,
  ) {}

  /**
   * Replace the pool with the proxies from `source`. An absent source or an
   * empty listing leaves the pool empty, which means direct access.
   */
  async initialize(source: IProxySource | null): Promise<void> {
    const seeds = source ? await source.load() : [];

    this.entries = seeds.map((seed, index) => ({
      ...seed,
      id: `proxy-${index + 1}`,
      failureCount: 0,
      successCount: 0,
    }));
    this.byId.clear();
    this.handles.clear();
    this.cursor = 0;

    for (const entry of this.entries) {
      this.byId.set(entry.id, entry);
      this.handles.set(
        entry.id,
        Object.freeze({
          id: entry.id,
          host: entry.host,
          port: entry.port,
          username: entry.username,
          password: entry.password,
          url: proxyUrl(entry),
        }),
      );
    }

    if (this.config.shuffle && this.entries.length > 1) {
      this.shuffle();
      this.logger.debug('Proxy list shuffled');
    }

    if (this.entries.length > 0) {
      this.logger.log(
        `Proxy pool initialized with ${this.entries.length} proxies from ${source?.name}`,
      );
    } else {
      this.logger.warn(
        'Proxy pool initialized with no proxies - requests will go direct',
      );
    }
  }

  hasProxies(): boolean {
    return this.entries.length > 0;
  }

  /**
   * Next available proxy in rotation. When every proxy is quarantined the one
   * whose quarantine ends soonest is returned. Null only for an empty pool.
   */
  nextProxy(): ProxyHandle | null {
    if (this.entries.length === 0) return null;

    const now = this.clock.now();
    for (let checked = 0; checked < this.entries.length; checked++) {
      const entry = this.entries[this.cursor];
      this.cursor = (this.cursor + 1) % this.entries.length;

      if (this.isAvailable(entry, now)) {
        entry.lastUsedAt = now;
        this.logger.debug(`Using proxy ${entry.host}:${entry.port}`);
        return this.handleFor(entry);
      }
    }

    const leastBad = this.entries.reduce((best, entry) =>
      this.disabledUntilMs(entry) < this.disabledUntilMs(best) ? entry : best,
    );
    this.logger.warn(
      `All proxies temporarily disabled, using ${leastBad.host}:${leastBad.port} (re-enabled soonest)`,
    );
    leastBad.lastUsedAt = now;
    return this.handleFor(leastBad);
  }

  /**
   * True when some proxy other than `current` is out of quarantine.
   */
  hasAlternativeTo(current: ProxyHandle | null): boolean {
    const now = this.clock.now();
    return this.entries.some(
      (entry) => entry.id !== current?.id && this.isAvailable(entry, now),
    );
  }

  reportSuccess(proxy: ProxyHandle): void {
    const entry = this.byId.get(proxy.id);
    if (!entry) {
      this.logger.warn(`Success reported for unknown proxy ${proxy.id}`);
      return;
    }

    entry.failureCount = 0;
    entry.successCount++;
    entry.lastUsedAt = this.clock.now();
    this.logger.debug(
      `Proxy success: ${entry.host}:${entry.port} (total: ${entry.successCount})`,
    );
  }

  /**
   * Count a failure; at the threshold the proxy is quarantined. The count is
   * not reset on quarantine, so one more failure after re-enabling re-disables it.
   */
  reportFailure(proxy: ProxyHandle): void {
    const entry = this.byId.get(proxy.id);
    if (!entry) {
      this.logger.warn(`Failure reported for unknown proxy ${proxy.id}`);
      return;
    }

    entry.failureCount++;

    if (entry.failureCount >= this.config.failureThreshold) {
      entry.disabledUntil = new Date(
        this.clock.now().getTime() + this.config.disableDurationMs,
      );
      this.logger.warn(
        `Proxy disabled: ${entry.host}:${entry.port} (failures: ${entry.failureCount}, disabled until: ${entry.disabledUntil.toISOString()})`,
      );
    } else {
      this.logger.debug(
        `Proxy failure: ${entry.host}:${entry.port} (failures: ${entry.failureCount}/${this.config.failureThreshold})`,
      );
    }
  }

  stats(): ProxyPoolStats {
    const now = this.clock.now();
    const available = this.entries.filter((entry) =>
      this.isAvailable(entry, now),
    ).length;

    return {
      total: this.entries.length,
      available,
      disabled: this.entries.length - available,
      totalSuccesses: this.entries.reduce((sum, e) => sum + e.successCount, 0),
      totalFailures: this.entries.reduce((sum, e) => sum + e.failureCount, 0),
    };
  }

  logStats(): void {
    const stats = this.stats();
    this.logger.log(
      `Proxy stats - Total: ${stats.total}, Available: ${stats.available}, Disabled: ${stats.disabled}, Successes: ${stats.totalSuccesses}, Failures: ${stats.totalFailures}`,
    );
  }

  /**
   * Copy of one entry's state, for observability and tests.
   */
  getEntry(id: string): Readonly<ProxyEntry> | undefined {
    const entry = this.byId.get(id);
    return entry ? { ...entry } : undefined;
  }

  resetAll(): void {
    for (const entry of this.entries) {
      entry.failureCount = 0;
      entry.successCount = 0;
      entry.disabledUntil = undefined;
    }
    this.logger.log('All proxy statistics reset');
  }

  private isAvailable(entry: ProxyEntry, now: Date): boolean {
    return (
      entry.disabledUntil === undefined ||
      entry.disabledUntil.getTime() <= now.getTime()
    );
  }

  private disabledUntilMs(entry: ProxyEntry): number {
    return entry.disabledUntil?.getTime() ?? Number.NEGATIVE_INFINITY;
  }

  private handleFor(entry: ProxyEntry): ProxyHandle {
    const handle = this.handles.get(entry.id);
    if (!handle) {
      throw new Error(`Proxy ${entry.id} has no handle`);
    }
    return handle;
  }

  // Fisher-Yates
  private shuffle(): void {
    for (let i = this.entries.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [this.entries[i], this.entries[j]] = [this.entries[j], this.entries[i]];
    }
  }
}
