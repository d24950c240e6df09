import { MockAgent } from 'undici';
import { WebshareProxySource } from './webshare-proxy.source';

const ORIGIN = 'https://proxy.test';
const BASE_URL = `${ORIGIN}/api/list/`;
const FIRST_PAGE = '/api/list/?mode=direct&page=1&page_size=100';

describe('WebshareProxySource', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('follows next links and maps every usable proxy', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: FIRST_PAGE, method: 'GET' }).reply(200, {
      next: `${BASE_URL}?mode=direct&page=2&page_size=100`,
      results: [
        {
          proxy_address: '203.0.113.5',
          port: 8080,
          username: 'u1',
          password: 'test-secret',
        },
        { proxy_address: '', port: 8081 },
      ],
    });
    pool
      .intercept({ path: '/api/list/?mode=direct&page=2&page_size=100', method: 'GET' })
      .reply(200, {
        next: null,
        results: [{ proxy_address: '203.0.113.6', port: '9090' }],
      });

    const source = new WebshareProxySource('test-token', agent, BASE_URL);

    await expect(source.load()).resolves.toEqual([
      { host: '203.0.113.5', port: 8080, username: 'u1', password: 'test-secret' },
      { host: '203.0.113.6', port: 9090, username: '', password: '' },
    ]);
  });

  it('keeps what was loaded before a failing page', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: FIRST_PAGE, method: 'GET' }).reply(200, {
      next: `${BASE_URL}?mode=direct&page=2&page_size=100`,
      results: [{ proxy_address: '203.0.113.5', port: 8080 }],
    });
    pool
      .intercept({ path: '/api/list/?mode=direct&page=2&page_size=100', method: 'GET' })
      .reply(500, 'upstream error');

    const source = new WebshareProxySource('test-token', agent, BASE_URL);

    await expect(source.load()).resolves.toEqual([
      { host: '203.0.113.5', port: 8080, username: '', password: '' },
    ]);
  });

  it('yields nothing when the token is rejected', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: FIRST_PAGE, method: 'GET' })
      .reply(401, { detail: 'Invalid token.' });

    const source = new WebshareProxySource('test-token', agent, BASE_URL);
    await expect(source.load()).resolves.toEqual([]);
  });
});
