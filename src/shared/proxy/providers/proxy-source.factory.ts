import fs from 'fs';
import { IProxySource } from '@/shared/proxy/interfaces/proxy.interface';
import { ProxySourceConfig } from '@/shared/config/pipeline.config';
import { FileProxySource } from './file-proxy.source';
import { WebshareProxySource } from './webshare-proxy.source';

/**
 * A local list wins; the Webshare listing is only consulted when no list file exists.
 */
export function resolveProxySource(
  config: ProxySourceConfig,
): IProxySource | null {
  if (config.listFile && fs.existsSync(config.listFile)) {
    return new FileProxySource(config.listFile);
  }
  if (config.webshareToken) {
    return new WebshareProxySource(config.webshareToken);
  }
  return null;
}
