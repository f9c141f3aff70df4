/**
 * @hd-funder/wallet: HD account derivation and scoped signing.
 */

export { AccountDeriver } from "./deriver.js";
export type { AccountDeriverConfig } from "./deriver.js";

export {
  DEFAULT_PATH_TEMPLATE,
  HARDENED_OFFSET,
  parsePathTemplate,
} from "./derivation-path.js";
export type { PathTemplate } from "./derivation-path.js";

export { createTransferSigner } from "./signer.js";

export { DerivationError } from "./errors.js";
export type { DerivationErrorCode } from "./errors.js";
