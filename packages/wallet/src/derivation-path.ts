/**
 * Derivation path templates.
 *
 * A template is a BIP-32 path with exactly one `{index}` placeholder,
 * e.g. "m/44'/60'/{index}'/0/0". Every segment is a decimal number or the
 * placeholder, optionally hardened with a trailing apostrophe.
 */

import { DerivationError } from "./errors.js";

export const DEFAULT_PATH_TEMPLATE = "m/44'/60'/{index}'/0/0";

/** First hardened child index; also the exclusive upper bound for an index. */
export const HARDENED_OFFSET = 0x80000000;

const PLACEHOLDER = "{index}";
const SEGMENT = /^(\d+|\{index\})'?$/;

export interface PathTemplate {
  readonly template: string;
  resolve(index: number): string;
}

/**
 * Parse and validate a path template.
 *
 * @throws DerivationError MALFORMED_PATH
 */
export function parsePathTemplate(template: string): PathTemplate {
  const segments = template.split("/");
  if (segments[0] !== "m" || segments.length < 2) {
    throw new DerivationError(
      "MALFORMED_PATH",
      `Derivation path must start with "m/": '${template}'`,
    );
  }

  let placeholders = 0;
  for (const segment of segments.slice(1)) {
    if (!SEGMENT.test(segment)) {
      throw new DerivationError(
        "MALFORMED_PATH",
        `Invalid segment '${segment}' in derivation path '${template}'`,
      );
    }
    if (segment.startsWith(PLACEHOLDER)) {
      placeholders++;
    } else if (Number(segment.replace("'", "")) >= HARDENED_OFFSET) {
      throw new DerivationError(
        "MALFORMED_PATH",
        `Segment '${segment}' exceeds 2^31 - 1 in derivation path '${template}'`,
      );
    }
  }

  if (placeholders !== 1) {
    throw new DerivationError(
      "MALFORMED_PATH",
      `Derivation path must contain exactly one ${PLACEHOLDER} placeholder, found ${placeholders}: '${template}'`,
    );
  }

  return {
    template,
    resolve: (index: number) => template.replace(PLACEHOLDER, String(index)),
  };
}
