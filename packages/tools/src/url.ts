/**
 * Percent-encode a product link for embedding in a quoted JS string inside an
 * HTML attribute. `/` stays literal; quotes and parentheses are encoded.
 */
export function encodeProductLink(link: string): string {
  return encodeURIComponent(link)
    .replace(/%2F/g, '/')
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Inverse of encodeProductLink. Input with malformed escapes is returned as-is.
 */
export function decodeProductLink(encoded: string): string {
  try {
    return decodeURIComponent(encoded);
  } catch {
    return encoded;
  }
}
