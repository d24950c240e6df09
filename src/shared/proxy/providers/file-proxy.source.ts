import fs from 'fs';
import { Logger } from '@nestjs/common';
import {
  IProxySource,
  ProxySeed,
} from '@/shared/proxy/interfaces/proxy.interface';
import { errorMessage } from '@/shared/lib/util';

const MIN_PORT = 1;
const MAX_PORT = 65535;

/**
 * Parse `host:port` or `host:port:username:password`.
 * Returns null for anything else, including a port outside 1-65535.
 */
export function parseProxyLine(line: string): ProxySeed | null {
  const parts = line.split(':').map((part) => part.trim());
  if (parts.length !== 2 && parts.length !== 4) return null;

  const [host, rawPort, username = '', password = ''] = parts;
  if (!host || !/^\d+$/.test(rawPort)) return null;

  const port = Number(rawPort);
  if (port < MIN_PORT || port > MAX_PORT) return null;

  return { host, port, username, password };
}

export class FileProxySource implements IProxySource {
  private readonly logger = new Logger(FileProxySource.name);
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `file:${filePath}`;
  }

  async load(): Promise<ProxySeed[]> {
    if (!fs.existsSync(this.filePath)) {
      this.logger.warn(`Proxy list ${this.filePath} does not exist`);
      return [];
    }

    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      this.logger.error(
        `Failed to read proxy list ${this.filePath}: ${errorMessage(error)}`,
      );
      return [];
    }

    const seeds: ProxySeed[] = [];
    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) continue;

      const seed = parseProxyLine(line);
      if (!seed) {
        this.logger.warn(`Invalid proxy format, skipping: ${line}`);
        continue;
      }
      seeds.push(seed);
    }

    this.logger.log(`Loaded ${seeds.length} proxies from ${this.filePath}`);
    return seeds;
  }
}
