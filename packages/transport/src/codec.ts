export type DecodeAttempt = { complete: true; value: unknown } | { complete: false };

/**
 * Incremental view over a growing receive buffer. `feed` returns true when
 * the bytes seen so far could plausibly form a complete document.
 */
export interface BoundaryScanner {
  feed(chunk: Uint8Array): boolean;
}

export interface DocumentCodec {
  encode(value: unknown): Buffer;
  tryDecode(bytes: Buffer): DecodeAttempt;
  createScanner(): BoundaryScanner;
}

const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

/**
 * Tracks container depth outside string literals. A JSON object or array can
 * only parse once its brackets balance, so re-parsing is skipped until then.
 * Multi-byte UTF-8 sequences never contain ASCII bytes, so scanning raw bytes
 * is safe across chunk splits.
 */
export function createJsonBoundaryScanner(): BoundaryScanner {
  let depth = 0;
  let inString = false;
  let escaped = false;

  return {
    feed(chunk) {
      for (const byte of chunk) {
        if (inString) {
          if (escaped) {
            escaped = false;
          } else if (byte === BACKSLASH) {
            escaped = true;
          } else if (byte === QUOTE) {
            inString = false;
          }
          continue;
        }
        if (byte === QUOTE) {
          inString = true;
        } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
          depth += 1;
        } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
          depth -= 1;
        }
      }
      // Unbalanced closers can never parse; let the decoder say so.
      return depth <= 0 && !inString;
    },
  };
}

const NON_FINITE_TOKEN = /NaN|Infinity/;
const NON_FINITE_LITERALS = ["-Infinity", "Infinity", "NaN"] as const;

/**
 * The add-on writes floats with Python's default JSON encoder, which emits
 * bare `NaN`, `Infinity` and `-Infinity`. Those tokens become `null` outside
 * string literals, the same value `JSON.stringify` gives them on the way out.
 */
export function replaceNonFiniteLiterals(text: string): string {
  let out = "";
  let inString = false;
  let escaped = false;
  let index = 0;

  while (index < text.length) {
    const char = text.charAt(index);
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      out += char;
      index += 1;
      continue;
    }
    if (char === '"') {
      inString = true;
      out += char;
      index += 1;
      continue;
    }
    const literal = NON_FINITE_LITERALS.find((candidate) => text.startsWith(candidate, index));
    if (literal) {
      out += "null";
      index += literal.length;
      continue;
    }
    out += char;
    index += 1;
  }
  return out;
}

function decodeUtf8(bytes: Buffer): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    // A multi-byte character split across chunks.
    return null;
  }
}

function parseDocument(text: string): DecodeAttempt {
  try {
    return { complete: true, value: JSON.parse(text) };
  } catch {
    // Truncated text or trailing garbage: not a complete document yet.
    return { complete: false };
  }
}

export const jsonCodec: DocumentCodec = {
  encode(value) {
    const text = JSON.stringify(value);
    if (text === undefined) {
      throw new TypeError("Value has no JSON representation.");
    }
    return Buffer.from(text, "utf8");
  },
  tryDecode(bytes) {
    if (bytes.length === 0) {
      return { complete: false };
    }
    const text = decodeUtf8(bytes);
    if (text === null) {
      return { complete: false };
    }
    const attempt = parseDocument(text);
    if (attempt.complete || !NON_FINITE_TOKEN.test(text)) {
      return attempt;
    }
    return parseDocument(replaceNonFiniteLiterals(text));
  },
  createScanner: createJsonBoundaryScanner,
};
