import { env } from '../config/env.js';

/**
 * Validates if the given string is an absolute http(s) URL
 * @param url - The URL string to validate
 * @returns boolean indicating if the URL is valid
 */
export const isValidUrl = (url: string): boolean => {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
};

/**
 * Checks if a hostname matches a domain pattern
 * This properly handles full domain matching to prevent partial matches
 * (e.g. 'nottiktok.com' should not match 'tiktok.com')
 * @param hostname - The hostname to check
 * @param domain - The domain pattern to match against
 * @returns Whether the hostname matches the domain
 */
export const isDomainMatch = (hostname: string, domain: string): boolean => {
  const host = hostname.toLowerCase().replace(/\.$/, '');
  const pattern = domain.toLowerCase().replace(/^\./, '');

  // Exact match
  if (host === pattern) return true;

  // Subdomain match (e.g. vm.tiktok.com matches tiktok.com)
  return host.endsWith(`.${pattern}`);
};

/**
 * Checks if the URL is hosted on one of the supported domains
 */
export const isSupportedPlatform = (
  url: string,
  domains: readonly string[] = env.SUPPORTED_DOMAINS,
): boolean => {
  try {
    const { hostname } = new URL(url);
    return domains.some((domain) => isDomainMatch(hostname, domain));
  } catch {
    return false;
  }
};
