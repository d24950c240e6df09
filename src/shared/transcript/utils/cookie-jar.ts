import fs from 'fs';
import { Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/lib/util';

const logger = new Logger('CookieJar');

const HTTP_ONLY_PREFIX = '#HttpOnly_';

export interface JarCookie {
  domain: string;
  name: string;
  value: string;
  /** Unix seconds; 0 for a session cookie */
  expires: number;
}

/**
 * Parse a Netscape cookies.txt export. Comment lines are skipped except the
 * `#HttpOnly_` prefix, which marks an ordinary cookie line.
 */
export function parseCookieJar(content: string): JarCookie[] {
  const cookies: JarCookie[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line) continue;
    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      line = line.slice(HTTP_ONLY_PREFIX.length);
    } else if (line.startsWith('#')) {
      continue;
    }

    const fields = line.split('\t');
    if (fields.length < 7) continue;

    const [domain, , , , expires, name, value] = fields;
    cookies.push({
      domain,
      name,
      value,
      expires: Number(expires) || 0,
    });
  }

  return cookies;
}

function matchesDomain(cookieDomain: string, suffix: string): boolean {
  const domain = cookieDomain.replace(/^\./, '');
  return domain === suffix || domain.endsWith(`.${suffix}`);
}

/**
 * Build a Cookie header for `domainSuffix` from unexpired jar cookies.
 */
export function cookieHeaderFor(
  cookies: JarCookie[],
  domainSuffix: string,
  now: Date,
): string {
  const nowSeconds = Math.floor(now.getTime() / 1000);
  return cookies
    .filter((cookie) => matchesDomain(cookie.domain, domainSuffix))
    .filter((cookie) => cookie.expires === 0 || cookie.expires > nowSeconds)
    .map((cookie) => `${cookie.name}=${cookie.value}`)
    .join('; ');
}

/**
 * Read the jar at `filePath`. A missing or unreadable file means no cookies.
 */
export function loadCookieJar(filePath: string | undefined): JarCookie[] {
  if (!filePath) return [];
  if (!fs.existsSync(filePath)) {
    logger.warn(`Cookie file ${filePath} not found, continuing without cookies`);
    return [];
  }

  try {
    const cookies = parseCookieJar(fs.readFileSync(filePath, 'utf-8'));
    logger.log(`Loaded ${cookies.length} cookies from ${filePath}`);
    return cookies;
  } catch (error) {
    logger.warn(`Failed to read cookie file ${filePath}: ${errorMessage(error)}`);
    return [];
  }
}
