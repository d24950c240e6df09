import fs from 'fs';
import os from 'os';
import path from 'path';
import { cookieHeaderFor, loadCookieJar, parseCookieJar } from './cookie-jar';

const JAR = [
  '# Netscape HTTP Cookie File',
  '.youtube.com\tTRUE\t/\tTRUE\t0\tPREF\tf6=40000000',
  '#HttpOnly_.youtube.com\tTRUE\t/\tTRUE\t1893456000\tSID\ttest-sid',
  '.youtube.com\tTRUE\t/\tTRUE\t1000\tOLD\tgone',
  '.google.com\tTRUE\t/\tTRUE\t0\tNID\tother',
  'not a cookie line',
].join('\n');

describe('cookie jar', () => {
  it('parses cookie lines including HttpOnly ones', () => {
    expect(parseCookieJar(JAR)).toEqual([
      { domain: '.youtube.com', name: 'PREF', value: 'f6=40000000', expires: 0 },
      { domain: '.youtube.com', name: 'SID', value: 'test-sid', expires: 1893456000 },
      { domain: '.youtube.com', name: 'OLD', value: 'gone', expires: 1000 },
      { domain: '.google.com', name: 'NID', value: 'other', expires: 0 },
    ]);
  });

  it('sends only unexpired cookies for the domain', () => {
    const header = cookieHeaderFor(
      parseCookieJar(JAR),
      'youtube.com',
      new Date('2026-01-01T00:00:00.000Z'),
    );
    expect(header).toBe('PREF=f6=40000000; SID=test-sid');
  });

  it('matches the domain on a label boundary', () => {
    const jar = parseCookieJar(
      [
        'youtube.com\tFALSE\t/\tTRUE\t0\tA\tbare',
        '.m.youtube.com\tTRUE\t/\tTRUE\t0\tB\tsub',
        '.notyoutube.com\tTRUE\t/\tTRUE\t0\tC\tlookalike',
      ].join('\n'),
    );

    expect(
      cookieHeaderFor(jar, 'youtube.com', new Date('2026-01-01T00:00:00.000Z')),
    ).toBe('A=bare; B=sub');
  });

  it('reads a jar from disk and tolerates a missing one', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cookies-'));
    try {
      const file = path.join(dir, 'cookies.txt');
      fs.writeFileSync(file, JAR);

      expect(loadCookieJar(file)).toHaveLength(4);
      expect(loadCookieJar(path.join(dir, 'missing.txt'))).toEqual([]);
      expect(loadCookieJar(undefined)).toEqual([]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
