import { describe, test, expect, vi, afterEach } from "vitest";
import { EncodingError } from "../lib/errors.js";
import { decodeInput, encodingFromLocale, normalizeInput, resolveEncoding } from "../lib/input.js";

const strict = { recoverInvalidInput: false };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("decodeInput", () => {
  test("UTF-8 by default, with a trailing newline added", () => {
    expect(decodeInput(new TextEncoder().encode("héllo"), strict)).toBe("héllo\n");
    expect(decodeInput(new TextEncoder().encode("done\n"), strict)).toBe("done\n");
  });

  test("drops a byte order mark", () => {
    expect(decodeInput(Uint8Array.of(0xef, 0xbb, 0xbf, 0x61), strict)).toBe("a\n");
  });

  test("decodes the named encoding", () => {
    expect(decodeInput(Uint8Array.of(0x63, 0x61, 0x66, 0xe9), { ...strict, encoding: "latin1" })).toBe("café\n");
  });

  test("malformed bytes are an EncodingError", () => {
    expect(() => decodeInput(Uint8Array.of(0x61, 0xff, 0x62), strict)).toThrow(EncodingError);
  });

  test("recovery skips malformed bytes with a warning", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(decodeInput(Uint8Array.of(0x61, 0xff, 0x62), { recoverInvalidInput: true })).toBe("ab\n");
    expect(spy).toHaveBeenCalledTimes(1);
  });

  test("an unknown label is an EncodingError", () => {
    try {
      decodeInput(Uint8Array.of(0x61), { ...strict, encoding: "no-such-encoding" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EncodingError);
      if (err instanceof EncodingError) expect(err.details.encoding).toBe("no-such-encoding");
    }
  });
});

describe("locale encoding", () => {
  test("reads the codeset of the locale", () => {
    expect(encodingFromLocale({ LANG: "ja_JP.EUC-JP" })).toBe("EUC-JP");
    expect(encodingFromLocale({ LANG: "de_DE.ISO-8859-1@euro" })).toBe("ISO-8859-1");
  });

  test("UTF-8 and C locales need no conversion", () => {
    expect(encodingFromLocale({ LANG: "en_US.UTF-8" })).toBeUndefined();
    expect(encodingFromLocale({ LANG: "C" })).toBeUndefined();
    expect(encodingFromLocale({})).toBeUndefined();
  });

  test("LC_ALL wins over LC_CTYPE and LANG", () => {
    expect(encodingFromLocale({ LC_ALL: "ru_RU.KOI8-R", LC_CTYPE: "ja_JP.EUC-JP", LANG: "en_US.UTF-8" })).toBe(
      "KOI8-R"
    );
  });

  test("an explicit encoding wins over the locale", () => {
    const env = { LANG: "ja_JP.EUC-JP" };
    expect(resolveEncoding({ encoding: "latin1", langEncoding: true }, env)).toBe("latin1");
    expect(resolveEncoding({ langEncoding: true }, env)).toBe("EUC-JP");
    expect(resolveEncoding({ langEncoding: false }, env)).toBeUndefined();
  });
});

test("normalizeInput only adds a missing newline", () => {
  expect(normalizeInput("")).toBe("\n");
  expect(normalizeInput("a\n")).toBe("a\n");
});
