import { Logger } from '@nestjs/common';
import { Dispatcher, request } from 'undici';
import {
  IProxySource,
  ProxySeed,
} from '@/shared/proxy/interfaces/proxy.interface';
import { errorMessage, isRecord } from '@/shared/lib/util';

export const WEBSHARE_API_URL = 'https://proxy.webshare.io/api/v2/proxy/list/';

const PAGE_SIZE = 100;
// Guards against a listing whose `next` never becomes null
const MAX_PAGES = 50;

interface WebshareProxy {
  proxy_address?: unknown;
  port?: unknown;
  username?: unknown;
  password?: unknown;
}

interface WebsharePage {
  next: string | null;
  results: WebshareProxy[];
}

function toPage(body: unknown): WebsharePage {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    throw new Error('Unexpected proxy listing response shape');
  }
  const results = body.results.filter(isRecord);
  const next = typeof body.next === 'string' ? body.next : null;
  return { next, results };
}

function toSeed(proxy: WebshareProxy): ProxySeed | null {
  const host = typeof proxy.proxy_address === 'string' ? proxy.proxy_address : '';
  const port = Number(proxy.port);
  if (!host || !Number.isInteger(port) || port <= 0) return null;

  return {
    host,
    port,
    username: typeof proxy.username === 'string' ? proxy.username : '',
    password: typeof proxy.password === 'string' ? proxy.password : '',
  };
}

/**
 * Token-authenticated Webshare proxy listing. Follows `next` links until exhausted.
 * Errors are logged and whatever was collected so far is returned.
 */
export class WebshareProxySource implements IProxySource {
  private readonly logger = new Logger(WebshareProxySource.name);
  readonly name = 'webshare';

  constructor(
    private readonly token: string,
    private readonly dispatcher?: Dispatcher,
    private readonly baseUrl: string = WEBSHARE_API_URL,
  ) {}

  async load(): Promise<ProxySeed[]> {
    const seeds: ProxySeed[] = [];
    let url: string | null =
      `${this.baseUrl}?mode=direct&page=1&page_size=${PAGE_SIZE}`;
    let pages = 0;

    try {
      while (url && pages < MAX_PAGES) {
        const page = await this.fetchPage(url);
        pages++;

        for (const proxy of page.results) {
          const seed = toSeed(proxy);
          if (seed) seeds.push(seed);
        }
        url = page.next;
      }

      this.logger.log(
        `Loaded ${seeds.length} proxies from Webshare API (${pages} pages)`,
      );
    } catch (error) {
      this.logger.error(
        `Failed to load proxies from Webshare API: ${errorMessage(error)}`,
      );
    }

    return seeds;
  }

  private async fetchPage(url: string): Promise<WebsharePage> {
    const response = await request(url, {
      method: 'GET',
      headers: { Authorization: `Token ${this.token}` },
      dispatcher: this.dispatcher,
    });

    if (response.statusCode >= 400) {
      await response.body.text();
      throw new Error(`HTTP Error: ${response.statusCode}`);
    }

    return toPage(await response.body.json());
  }
}
