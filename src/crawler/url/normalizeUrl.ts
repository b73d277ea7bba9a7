const DEFAULT_PORT_MAP: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

export function normalizeUrl(raw: string, base?: URL | string): string | null {
  try {
    const url = new URL(raw, base);

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }

    url.protocol = url.protocol.toLowerCase();
    url.hostname = url.hostname.toLowerCase();
    url.hash = '';

    removeDefaultPort(url);
    normalizePath(url);
    sortQuery(url);

    return url.toString();
  } catch {
    return null;
  }
}

/** Host (without port) of an already-normalized URL; the unit of politeness. */
export function domainOf(url: string): string {
  return new URL(url).hostname;
}

function removeDefaultPort(url: URL): void {
  const defaultPort = DEFAULT_PORT_MAP[url.protocol];
  if (defaultPort && url.port === defaultPort) {
    url.port = '';
  }
}

function normalizePath(url: URL): void {
  if (url.pathname === '/') {
    return;
  }

  const trimmed = url.pathname.replace(/\/+$/, '');
  url.pathname = trimmed.length > 0 ? trimmed : '/';
}

function sortQuery(url: URL): void {
  if (!url.search) {
    return;
  }

  // Stable by key, so repeated keys keep their relative order.
  url.searchParams.sort();
  const search = url.searchParams.toString();
  url.search = search ? `?${search}` : '';
}
