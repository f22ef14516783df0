/**
 * Header Spoofing Utilities
 * Make requests appear as real browser traffic
 */

export interface BrowserFingerprint {
  userAgent: string;
  acceptLanguage: string;
  accept: string;
  secFetchDest?: string;
  secFetchMode?: string;
  secFetchSite?: string;
  secChUa?: string;
  secChUaPlatform?: string;
  secChUaMobile?: string;
}

// Desktop Chrome, the profile the regulation sites serve without a challenge
const BROWSER_FINGERPRINTS: BrowserFingerprint[] = [
  // Chrome on Mac
  {
    userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    acceptLanguage: 'en-US,en;q=0.9',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    secFetchDest: 'document',
    secFetchMode: 'navigate',
    secFetchSite: 'none',
    secChUa: '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
    secChUaPlatform: '"macOS"',
    secChUaMobile: '?0',
  },
  // Chrome on Windows
  {
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    acceptLanguage: 'en-US,en;q=0.9',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    secFetchDest: 'document',
    secFetchMode: 'navigate',
    secFetchSite: 'none',
    secChUa: '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
    secChUaPlatform: '"Windows"',
    secChUaMobile: '?0',
  },
];

/**
 * Get a random browser fingerprint
 */
export function getRandomFingerprint(): BrowserFingerprint {
  return BROWSER_FINGERPRINTS[Math.floor(Math.random() * BROWSER_FINGERPRINTS.length)];
}

/**
 * Build headers object from fingerprint
 */
export function buildHeaders(fingerprint: BrowserFingerprint, customHeaders?: Record<string, string>): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': fingerprint.userAgent,
    'Accept-Language': fingerprint.acceptLanguage,
    'Accept': fingerprint.accept,
    'Upgrade-Insecure-Requests': '1',
    'Cache-Control': 'max-age=0',
  };

  // Add Sec-* headers if present (Chrome/Edge)
  if (fingerprint.secFetchDest) headers['Sec-Fetch-Dest'] = fingerprint.secFetchDest;
  if (fingerprint.secFetchMode) headers['Sec-Fetch-Mode'] = fingerprint.secFetchMode;
  if (fingerprint.secFetchSite) headers['Sec-Fetch-Site'] = fingerprint.secFetchSite;
  if (fingerprint.secChUa) headers['Sec-Ch-Ua'] = fingerprint.secChUa;
  if (fingerprint.secChUaPlatform) headers['Sec-Ch-Ua-Platform'] = fingerprint.secChUaPlatform;
  if (fingerprint.secChUaMobile) headers['Sec-Ch-Ua-Mobile'] = fingerprint.secChUaMobile;

  if (customHeaders) {
    Object.assign(headers, customHeaders);
  }

  return headers;
}

/**
 * Headers for one crawl session; the fingerprint stays fixed for the session
 */
export function getSessionHeaders(userAgent?: string): Record<string, string> {
  const fingerprint = getRandomFingerprint();
  return buildHeaders(fingerprint, userAgent ? { 'User-Agent': userAgent } : undefined);
}
