/**
 * Case-insensitive header access. A WHATWG `Headers` instance satisfies
 * this interface, as does the Node adapter in the server package.
 *
 * String values are expected to hold one byte per code point, which is how
 * Node decodes header bytes.
 */
export interface HeaderLookup {
  get(name: string): string | Uint8Array | null | undefined;
}

export const HOST = "host";

/** Maps each byte to the code point of the same value. Never fails. */
export function decodeHeaderBytes(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    "latin1",
  );
}
