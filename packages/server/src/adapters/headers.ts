import type { IncomingMessage } from "node:http";
import type { HeaderLookup } from "@request-authority/core/http";

/**
 * Case-insensitive lookup over `rawHeaders`, returning the first value.
 * Node decodes header bytes as latin1, so values already map one byte to
 * one code point.
 */
export function nodeHeaderLookup(
  req: Pick<IncomingMessage, "rawHeaders">,
): HeaderLookup {
  return {
    get(name: string): string | undefined {
      const wanted = name.toLowerCase();
      const raw = req.rawHeaders;
      for (let i = 0; i + 1 < raw.length; i += 2) {
        if (raw[i].toLowerCase() === wanted) {
          return raw[i + 1];
        }
      }
      return undefined;
    },
  };
}
