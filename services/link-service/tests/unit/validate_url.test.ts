import { describe, expect, test } from "vitest";
import { validateLongUrl, MAX_URL_LENGTH } from "../../src/validate_url.js";

describe("validateLongUrl", () => {
  test("accepts https and returns the trimmed text", () => {
    const r = validateLongUrl(Buffer.from("  https://example.com/long/path\n"));
    expect(r).toEqual({ ok: true, url: "https://example.com/long/path" });
  });

  test("keeps the text as sent rather than normalizing it", () => {
    const r = validateLongUrl("HTTP://Example.com");
    expect(r).toEqual({ ok: true, url: "HTTP://Example.com" });
  });

  test("rejects a missing or blank body", () => {
    expect(validateLongUrl(undefined)).toEqual({ ok: false, error: "url is required" });
    expect(validateLongUrl(Buffer.alloc(0))).toEqual({ ok: false, error: "url is required" });
    expect(validateLongUrl(" \n\t")).toEqual({ ok: false, error: "url is required" });
  });

  test("rejects javascript scheme", () => {
    const r = validateLongUrl("javascript:alert(1)");
    expect(r).toEqual({ ok: false, error: "unsupported url scheme: javascript" });
  });

  test("rejects invalid url", () => {
    const r = validateLongUrl("not-a-url");
    expect(r).toEqual({ ok: false, error: "url is not a valid URL" });
  });

  test("rejects bytes that are not utf-8", () => {
    const r = validateLongUrl(Buffer.from([0x68, 0x74, 0xff, 0xfe]));
    expect(r).toEqual({ ok: false, error: "url is not valid utf-8" });
  });

  test("rejects urls that cannot go into a Location header verbatim", () => {
    expect(validateLongUrl("https://example.com/a b")).toEqual({
      ok: false,
      error: "url contains characters that must be percent-encoded"
    });
    expect(validateLongUrl("https://example.com/café").ok).toBe(false);
  });

  test("rejects overly long urls", () => {
    const long = `https://example.com/${"a".repeat(MAX_URL_LENGTH)}`;
    expect(validateLongUrl(long)).toEqual({ ok: false, error: "url is too long" });
  });
});
