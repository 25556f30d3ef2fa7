/**
 * Type declaration for json-canonicalize (RFC 8785 JSON Canonicalization Scheme)
 */
declare module 'json-canonicalize' {
  /**
   * Serialize a value as canonical JSON: sorted keys, no whitespace,
   * ECMAScript number formatting.
   */
  export function canonicalize(obj: unknown, allowCircular?: boolean): string;
}
