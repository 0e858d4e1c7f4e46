const MAX_BODY_LOG_CHARS = 300;
const SECRET_QUERY_KEYS = ["access_token", "client_secret", "fb_exchange_token", "code", "refresh_token"];

export function redactToken(value: string | null | undefined): string {
  if (!value) return "[redacted]";
  if (value.length < 12) return "[redacted]";
  return `${value.slice(0, 4)}...[redacted]`;
}

/** Strips secret-bearing query parameters so a request URL can be logged or put in a trail. */
export function redactUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return "[redacted-url]";
  }

  for (const key of SECRET_QUERY_KEYS) {
    if (url.searchParams.has(key)) {
      url.searchParams.set(key, "[redacted]");
    }
  }

  // URLSearchParams encodes the brackets; keep the marker readable.
  return url.toString().replace(/%5Bredacted%5D/g, "[redacted]");
}

export function redactBody(value: string | null | undefined): string {
  if (!value) return "";
  const scrubbed = value.replace(/("(?:access_token|refresh_token|client_secret)"\s*:\s*")[^"]*"/g, '$1[redacted]"');
  if (scrubbed.length <= MAX_BODY_LOG_CHARS) {
    return scrubbed;
  }
  return `${scrubbed.slice(0, MAX_BODY_LOG_CHARS)}...[truncated:${scrubbed.length - MAX_BODY_LOG_CHARS} chars]`;
}
