import { domainOf } from './normalizeUrl.js';

/**
 * Decides whether a discovered link may enter the frontier. With no host
 * restriction every http(s) link is in scope.
 */
export function createScopeFilter(seedUrls: readonly string[], sameHostOnly: boolean): (url: string) => boolean {
  if (!sameHostOnly) {
    return () => true;
  }

  const hosts = new Set(seedUrls.map((seed) => domainOf(seed)));
  return (url: string) => {
    try {
      return hosts.has(domainOf(url));
    } catch {
      return false;
    }
  };
}
