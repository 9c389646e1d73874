/**
 * Robots Policy Cache Tests
 */

import { RobotsPolicyCache, isPathAllowed, parseRobotsTxt } from '../robotsPolicy';
import { createFakeFetch, robotsRoute } from '../../__tests__/helpers/fakeFetch';

describe('parseRobotsTxt', () => {
  it('collects Disallow prefixes from every group', () => {
    const rules = parseRobotsTxt(
      [
        'User-agent: googlebot',
        'Disallow: /private/',
        '',
        'User-agent: *',
        'Disallow: /tmp # scratch space',
        'Allow: /tmp/public',
        'disallow: /lowercase',
        'Disallow:',
        '  Disallow: /indented',
        'Disallow: /private/',
      ].join('\r\n')
    );

    expect(rules).toEqual({ disallowAll: false, disallowedPrefixes: ['/private/', '/tmp'] });
  });

  it('treats "Disallow: /" as disallow-all', () => {
    expect(parseRobotsTxt('User-agent: *\nDisallow: /\n').disallowAll).toBe(true);
  });

  it('returns no rules for an empty file', () => {
    expect(parseRobotsTxt('')).toEqual({ disallowAll: false, disallowedPrefixes: [] });
  });
});

describe('isPathAllowed', () => {
  const policy = {
    origin: 'http://a.com',
    source: 'fetched' as const,
    disallowAll: false,
    disallowedPrefixes: ['/private/', '/search'],
  };

  it('rejects paths under a disallowed prefix', () => {
    expect(isPathAllowed(policy, '/private/notes')).toBe(false);
    expect(isPathAllowed(policy, '/search?q=x')).toBe(false);
  });

  it('allows other paths', () => {
    expect(isPathAllowed(policy, '/public/page')).toBe(true);
    expect(isPathAllowed(policy, '/private')).toBe(true);
  });

  it('rejects everything when disallow-all is set', () => {
    expect(isPathAllowed({ ...policy, disallowAll: true, disallowedPrefixes: ['/'] }, '/anything')).toBe(false);
  });
});

describe('RobotsPolicyCache', () => {
  it('enforces fetched rules', async () => {
    const { fetchImpl } = createFakeFetch({
      'http://a.com/robots.txt': robotsRoute('User-agent: *\nDisallow: /private/\n'),
    });
    const cache = new RobotsPolicyCache({ fetchImpl });

    await expect(cache.isAllowed('http://a.com/private/report')).resolves.toBe(false);
    await expect(cache.isAllowed('http://a.com/public/page')).resolves.toBe(true);
  });

  it('fails open when robots.txt returns 404', async () => {
    const { fetchImpl } = createFakeFetch({});
    const cache = new RobotsPolicyCache({ fetchImpl });

    await expect(cache.isAllowed('http://a.com/private/report')).resolves.toBe(true);
    await expect(cache.getPolicy('http://a.com')).resolves.toEqual({
      origin: 'http://a.com',
      source: 'unavailable',
      disallowAll: false,
      disallowedPrefixes: [],
      reason: 'HTTP 404',
    });
  });

  it('fails open when robots.txt times out', async () => {
    const { fetchImpl } = createFakeFetch({
      'http://slow.com/robots.txt': { error: 'The operation was aborted due to timeout', timeout: true },
    });
    const cache = new RobotsPolicyCache({ fetchImpl });

    await expect(cache.isAllowed('http://slow.com/anything')).resolves.toBe(true);
  });

  it('blocks a whole origin on "Disallow: /"', async () => {
    const { fetchImpl } = createFakeFetch({
      'http://closed.com/robots.txt': robotsRoute('User-agent: *\nDisallow: /\n'),
    });
    const cache = new RobotsPolicyCache({ fetchImpl });

    await expect(cache.isAllowed('http://closed.com/')).resolves.toBe(false);
    await expect(cache.isAllowed('http://closed.com/about')).resolves.toBe(false);
  });

  it('fetches robots.txt once for concurrent first lookups of an origin', async () => {
    const fake = createFakeFetch({
      'http://a.com/robots.txt': { ...robotsRoute('Disallow: /private/'), delayMs: 20 },
    });
    const cache = new RobotsPolicyCache({ fetchImpl: fake.fetchImpl });

    const results = await Promise.all([
      cache.isAllowed('http://a.com/one'),
      cache.isAllowed('http://a.com/private/two'),
      cache.isAllowed('http://a.com/three'),
    ]);

    expect(results).toEqual([true, false, true]);
    expect(fake.callCount('http://a.com/robots.txt')).toBe(1);
    expect(cache.robotsFetches).toBe(1);
  });

  it('keeps one entry per origin', async () => {
    const fake = createFakeFetch({});
    const cache = new RobotsPolicyCache({ fetchImpl: fake.fetchImpl });

    await cache.isAllowed('http://a.com/x');
    await cache.isAllowed('http://a.com/y');
    await cache.isAllowed('https://a.com/x');
    await cache.isAllowed('http://b.com/x');

    expect(cache.size).toBe(3);
    expect(fake.calls).toEqual([
      'http://a.com/robots.txt',
      'https://a.com/robots.txt',
      'http://b.com/robots.txt',
    ]);
  });
});
