/**
 * JSON Canonicalization Scheme (JCS) implementation per RFC 8785.
 *
 * Signer and verifier must produce byte-identical output for the same
 * logical payload, so anything JSON cannot represent exactly is rejected
 * with a CanonicalizationError instead of being coerced.
 */

import { CanonicalizationError } from './exceptions.js';

/**
 * Type representing any valid JSON value.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * JSON object with string keys.
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Compare two strings by UTF-16 code units, as RFC 8785 section 3.2.3 requires.
 */
export function compareUtf16(a: string, b: string): number {
  const minLen = Math.min(a.length, b.length);
  for (let i = 0; i < minLen; i++) {
    const diff = a.charCodeAt(i) - b.charCodeAt(i);
    if (diff !== 0) {
      return diff;
    }
  }
  return a.length - b.length;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * JSON Canonicalization Scheme (RFC 8785) implementation.
 *
 * Produces deterministic JSON output by:
 * 1. Sorting object keys lexicographically by UTF-16 code units
 * 2. Using no whitespace between tokens
 * 3. Using the ECMAScript number serialization
 * 4. Using minimal string escaping
 */
export class JCSCanonicalizer {
  /**
   * Canonicalize a value to a JCS-compliant JSON string.
   *
   * @param value - Any JSON-serializable value
   * @returns Canonical JSON string per RFC 8785
   * @throws CanonicalizationError for values JSON cannot represent
   */
  canonicalize(value: unknown): string {
    return this.canonicalizeValue(value, '$', new Set<object>());
  }

  /**
   * Canonicalize a value and encode the result as UTF-8.
   */
  canonicalizeToBytes(value: unknown): Uint8Array {
    return new TextEncoder().encode(this.canonicalize(value));
  }

  private canonicalizeValue(value: unknown, path: string, ancestors: Set<object>): string {
    if (value === null) {
      return 'null';
    }

    switch (typeof value) {
      case 'boolean':
        return value ? 'true' : 'false';
      case 'string':
        return this.canonicalizeString(value);
      case 'number':
        return this.canonicalizeNumber(value, path);
      case 'object':
        break;
      default:
        throw new CanonicalizationError(`Cannot canonicalize ${typeof value} at ${path}`);
    }

    if (ancestors.has(value)) {
      throw new CanonicalizationError(`Cyclic reference at ${path}`);
    }

    ancestors.add(value);
    try {
      if (Array.isArray(value)) {
        return this.canonicalizeArray(value, path, ancestors);
      }
      if (!isPlainObject(value)) {
        const tag = Object.prototype.toString.call(value);
        throw new CanonicalizationError(`Cannot canonicalize ${tag} at ${path}`);
      }
      return this.canonicalizeObject(value, path, ancestors);
    } finally {
      ancestors.delete(value);
    }
  }

  /**
   * Canonicalize an object with keys sorted by UTF-16 code units.
   */
  private canonicalizeObject(
    obj: Record<string, unknown>,
    path: string,
    ancestors: Set<object>
  ): string {
    const sortedKeys = Object.keys(obj).sort(compareUtf16);

    const pairs = sortedKeys.map((key) => {
      const canonicalKey = this.canonicalizeString(key);
      const canonicalValue = this.canonicalizeValue(obj[key], `${path}.${key}`, ancestors);
      return `${canonicalKey}:${canonicalValue}`;
    });

    return '{' + pairs.join(',') + '}';
  }

  private canonicalizeArray(arr: unknown[], path: string, ancestors: Set<object>): string {
    const elements: string[] = [];
    // Indexed loop so holes in sparse arrays surface as undefined
    for (let i = 0; i < arr.length; i++) {
      elements.push(this.canonicalizeValue(arr[i], `${path}[${i}]`, ancestors));
    }
    return '[' + elements.join(',') + ']';
  }

  /**
   * Escape and quote a string according to RFC 8259 with minimal escaping.
   *
   * Only escapes characters that MUST be escaped in JSON strings:
   * - Control characters (U+0000 to U+001F)
   * - Backslash and double quote
   */
  private canonicalizeString(s: string): string {
    const result: string[] = ['"'];

    for (let i = 0; i < s.length; i++) {
      const char = s[i];
      const code = s.charCodeAt(i);

      if (char === '"') {
        result.push('\\"');
      } else if (char === '\\') {
        result.push('\\\\');
      } else if (code === 0x08) {
        result.push('\\b');
      } else if (code === 0x09) {
        result.push('\\t');
      } else if (code === 0x0a) {
        result.push('\\n');
      } else if (code === 0x0c) {
        result.push('\\f');
      } else if (code === 0x0d) {
        result.push('\\r');
      } else if (code < 0x20) {
        result.push('\\u' + code.toString(16).padStart(4, '0'));
      } else {
        result.push(char);
      }
    }

    result.push('"');
    return result.join('');
  }

  /**
   * Format a number using the ECMAScript Number-to-String algorithm,
   * which RFC 8785 adopts verbatim.
   */
  private canonicalizeNumber(n: number, path: string): string {
    if (!Number.isFinite(n)) {
      throw new CanonicalizationError(`Cannot canonicalize ${n} at ${path}: not valid JSON`);
    }

    // -0 serializes as 0
    if (n === 0) {
      return '0';
    }

    return String(n);
  }
}

// Module-level convenience instance
const canonicalizer = new JCSCanonicalizer();

/**
 * Canonicalize a value to a JCS-compliant JSON string.
 *
 * @param value - Any JSON-serializable value
 * @returns Canonical JSON string per RFC 8785
 */
export function canonicalize(value: unknown): string {
  return canonicalizer.canonicalize(value);
}

/**
 * Canonicalize a value and return its UTF-8 bytes.
 */
export function canonicalizeToBytes(value: unknown): Uint8Array {
  return canonicalizer.canonicalizeToBytes(value);
}
