/**
 * Link Extractor Tests
 */

import { extractLinks } from '../linkExtractor';

describe('extractLinks', () => {
  it('returns raw href values of every anchor', () => {
    const html = `
      <html><body>
        <nav><a href="/about">About</a></nav>
        <p>See <a href="https://other.com/page#part">this</a> and <a href="contact.html">that</a>.</p>
      </body></html>
    `;

    expect(Array.from(extractLinks(html))).toEqual(['/about', 'https://other.com/page#part', 'contact.html']);
  });

  it('deduplicates and trims hrefs', () => {
    const html = '<a href=" /a ">1</a><a href="/a">2</a><a href="/b">3</a>';

    expect(Array.from(extractLinks(html))).toEqual(['/a', '/b']);
  });

  it('ignores anchors without an href or with an empty one', () => {
    const html = '<a name="top">top</a><a href="">empty</a><a href="   ">blank</a><a href="/x">x</a>';

    expect(Array.from(extractLinks(html))).toEqual(['/x']);
  });

  it('ignores links outside anchor elements', () => {
    const html = '<link href="/style.css" rel="stylesheet"><img src="/a.png"><area href="/map">';

    expect(extractLinks(html).size).toBe(0);
  });

  it('tolerates malformed markup', () => {
    const html = '<div><a href="/ok">ok<p>unclosed <a href="/also">also';

    expect(Array.from(extractLinks(html))).toEqual(['/ok', '/also']);
  });

  it('returns an empty set for an empty document', () => {
    expect(extractLinks('').size).toBe(0);
  });
});
