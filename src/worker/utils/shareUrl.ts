import { ValidationError } from '../errors.js';

const URL_PATTERN = /https?:\/\/[^\s]+/;

/**
 * Pulls the first http(s) URL out of shared text such as
 * "look at this https://v.douyin.com/abc123/ !" and checks it has the shape
 * of a share link on one of the allowed domains.
 */
export function normalizeShareUrl(input: string, allowedHosts: readonly string[]): string {
  const text = input.trim();
  if (!text) {
    throw new ValidationError('source_url is required');
  }

  const match = text.match(URL_PATTERN);
  if (!match) {
    throw new ValidationError('source_url must contain an http(s) URL');
  }

  let url: URL;
  try {
    url = new URL(match[0]);
  } catch {
    throw new ValidationError(`source_url is not a valid URL: ${match[0]}`);
  }

  const host = url.hostname.toLowerCase();
  const recognized = allowedHosts.some(domain => host === domain || host.endsWith(`.${domain}`));
  if (!recognized) {
    throw new ValidationError(`Unsupported share link host: ${host}`);
  }

  if (url.pathname === '/' || url.pathname === '') {
    throw new ValidationError('Share link is missing its content path');
  }

  return url.toString();
}
