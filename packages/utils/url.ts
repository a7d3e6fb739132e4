/**
* URL helpers shared by the server routes and the browser scripts.
* Nothing here may import Node modules: the client bundle includes this file.
*/

const ALLOWED_PROTOCOLS = ['http:', 'https:'];

/**
* True when the input parses as an absolute http(s) URL with a host
*/
export function isValidHttpUrl(input: string): boolean {
  try {
    const parsed = new URL(input);
    return ALLOWED_PROTOCOLS.includes(parsed.protocol) && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

/**
* Trim the input and drop the fragment. Returns the trimmed input unchanged
* when it is not an http(s) URL, so callers can still report it.
*/
export function normalizeUrl(input: string): string {
  const trimmed = (input ?? '').trim();
  if (!isValidHttpUrl(trimmed)) return trimmed;
  const parsed = new URL(trimmed);
  parsed.hash = '';
  return parsed.toString();
}

/**
* Host name without a leading "www.", or '' for an unparseable URL
*/
export function getHostname(input: string): string {
  try {
    return new URL(input).hostname.replace(/^www\./i, '');
  } catch {
    return '';
  }
}
