import { describe, expect, it } from 'vitest';

import { parseLinks } from '../src/crawler/parsing/parseLinks.js';

const PAGE = 'https://example.com/docs/index.html';

describe('parseLinks', () => {
  it('returns unique absolute links', () => {
    const html = `
      <html>
        <body>
          <a href="/a">A</a>
          <a href="/a#top">Duplicate</a>
          <a href="b">B</a>
        </body>
      </html>
    `;

    expect(parseLinks(html, PAGE)).toEqual(['https://example.com/a', 'https://example.com/docs/b']);
  });

  it('ignores anchors without usable href attributes', () => {
    const html = `
      <html>
        <body>
          <a>No href</a>
          <a href="">Empty</a>
          <a href="#section">Fragment</a>
          <a href="mailto:team@example.com">Mail</a>
          <a href="javascript:void(0)">Script</a>
          <a href="  /c  ">Trimmed</a>
        </body>
      </html>
    `;

    expect(parseLinks(html, PAGE)).toEqual(['https://example.com/c']);
  });

  it('resolves relative links against a declared base href', () => {
    const html = `
      <html>
        <head><base href="https://cdn.example.com/root/"></head>
        <body><a href="page">Page</a></body>
      </html>
    `;

    expect(parseLinks(html, PAGE)).toEqual(['https://cdn.example.com/root/page']);
  });

  it('drops nofollow links only when asked to', () => {
    const html = '<a href="/keep">Keep</a><a rel="external nofollow" href="/skip">Skip</a>';

    expect(parseLinks(html, PAGE)).toEqual(['https://example.com/keep', 'https://example.com/skip']);
    expect(parseLinks(html, PAGE, { respectNofollow: true })).toEqual(['https://example.com/keep']);
  });
});
