/**
 * URL Normalization Utilities
 * Functions for resolving and vetting navigation hrefs
 */

/**
 * Doubled path separators outside the scheme prefix. Such hrefs loop back
 * into the hierarchy and must never be dereferenced.
 */
export function isMalformedHref(href: string): boolean {
  if (href.endsWith('//')) {
    return true;
  }
  return href.split('://').join('').includes('//');
}

/**
 * Normalize a URL for identity checks: drop the fragment, lowercase the host
 */
export function normalizeUrl(url: string): string {
  try {
    const urlObj = new URL(url);
    urlObj.hash = '';
    urlObj.hostname = urlObj.hostname.toLowerCase();
    return urlObj.href;
  } catch {
    return url;
  }
}

/**
 * Resolve a navigation href against the site base URL
 */
export function resolveNodeUrl(href: string, siteBaseUrl: string): string {
  return normalizeUrl(new URL(href, siteBaseUrl).href);
}

/**
 * Extract domain from URL
 */
export function extractDomain(url: string): string {
  try {
    let hostname = new URL(url).hostname.toLowerCase();
    if (hostname.startsWith('www.')) {
      hostname = hostname.substring(4);
    }
    return hostname;
  } catch {
    return '';
  }
}

/**
 * Check if two URLs are from the same domain
 */
export function isSameDomain(url1: string, url2: string): boolean {
  const domain = extractDomain(url1);
  return domain !== '' && domain === extractDomain(url2);
}
