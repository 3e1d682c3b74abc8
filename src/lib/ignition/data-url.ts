// Path: src/lib/ignition/data-url.ts
// RFC 2397 data URLs for inline Ignition file contents

const UTF8_BASE64_PREFIX = 'data:text/plain;charset=utf-8;base64,';

/**
 * Encode text as a base64 UTF-8 data URL
 */
export function createUtf8DataSource(content: string): string {
  return UTF8_BASE64_PREFIX + Buffer.from(content, 'utf-8').toString('base64');
}

/**
 * Decode the payload of a data URL.
 * Base64 payloads are decoded, plain ones percent-decoded; anything that is
 * not a data URL is returned as is.
 */
export function decodeDataSource(source: string): string {
  if (!source.startsWith('data:')) {
    return source;
  }

  const comma = source.indexOf(',');
  if (comma === -1) {
    return source;
  }

  const header = source.substring(5, comma);
  const payload = source.substring(comma + 1);

  if (header.split(';').includes('base64')) {
    return Buffer.from(payload, 'base64').toString('utf-8');
  }

  try {
    return decodeURIComponent(payload);
  } catch {
    // Not percent-encoded after all
    return payload;
  }
}
