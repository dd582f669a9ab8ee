export const MAX_URL_LENGTH = 2048;

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);
// Visible ASCII only: the stored text goes into a Location header unchanged.
const HEADER_SAFE = /^[\x21-\x7e]+$/;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export type UrlCheck = { ok: true; url: string } | { ok: false; error: string };

/**
 * Validate the raw body of `POST /put`. On success `url` is the trimmed text
 * as sent, not a normalized form.
 */
export function validateLongUrl(body: Buffer | string | undefined): UrlCheck {
  if (body === undefined || body.length === 0) {
    return { ok: false, error: "url is required" };
  }

  let text: string;
  if (typeof body === "string") {
    text = body;
  } else {
    try {
      text = utf8.decode(body);
    } catch {
      return { ok: false, error: "url is not valid utf-8" };
    }
  }

  const s = text.trim();
  if (s.length === 0) return { ok: false, error: "url is required" };
  if (s.length > MAX_URL_LENGTH) return { ok: false, error: "url is too long" };

  let parsed: URL;
  try {
    parsed = new URL(s);
  } catch {
    return { ok: false, error: "url is not a valid URL" };
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    return { ok: false, error: `unsupported url scheme: ${parsed.protocol.slice(0, -1)}` };
  }

  if (!HEADER_SAFE.test(s)) {
    return { ok: false, error: "url contains characters that must be percent-encoded" };
  }

  return { ok: true, url: s };
}
