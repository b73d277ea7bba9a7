import { load } from 'cheerio';
import type { Element as CheerioElement } from 'domhandler';

import { createParseError } from '../../errors.js';
import { normalizeUrl } from '../url/normalizeUrl.js';

export interface ParseLinksOptions {
  /** Drop anchors marked rel="nofollow". */
  respectNofollow?: boolean;
}

const NON_NAVIGABLE = /^(#|mailto:|tel:|javascript:|data:)/i;

/**
 * Extracts unique, normalized absolute links from an HTML page, resolving
 * relative hrefs against `<base href>` when the page declares one.
 */
export function parseLinks(html: string, pageUrl: string, options: ParseLinksOptions = {}): string[] {
  try {
    const $ = load(html);
    const base = resolveBase($('base[href]').first().attr('href'), pageUrl);
    const links = new Set<string>();

    $('a[href]').each((_idx: number, element: CheerioElement) => {
      const anchor = $(element);
      const href = anchor.attr('href')?.trim();
      if (!href || NON_NAVIGABLE.test(href)) {
        return;
      }

      if (options.respectNofollow && /\bnofollow\b/i.test(anchor.attr('rel') ?? '')) {
        return;
      }

      const normalized = normalizeUrl(href, base);
      if (normalized) {
        links.add(normalized);
      }
    });

    return [...links];
  } catch (error) {
    throw createParseError('Failed to parse links from HTML', { htmlLength: html.length, pageUrl }, { cause: error });
  }
}

function resolveBase(declared: string | undefined, pageUrl: string): string {
  if (!declared) {
    return pageUrl;
  }

  try {
    return new URL(declared, pageUrl).href;
  } catch {
    return pageUrl;
  }
}
