/**
 * Command-line arguments.
 *
 * Exactly one mode flag per invocation. Anything else is a usage error.
 */

import { parseArgs } from "node:util";
import type { EngineMode } from "@hd-funder/engine";

export const USAGE = `Usage: hd-funder <mode>

Modes (exactly one):
  --init-dist   Fund every derived account to the target balance, then exit
  --cont-fund   Keep accounts above threshold until interrupted
  --reclaim     Sweep balances above the reserve back to the root account
  --status      Print every account's address and balance

Options:
  -h, --help    Show this message

Configuration is read from the environment (and .env): MNEMONIC, RPC_URL,
CHAIN_ID, DERIVATION_PATH, ACCOUNT_COUNT, ROOT_INDEX, FUNDING_THRESHOLD,
FUNDING_TARGET, RECLAIM_RESERVE, POLL_INTERVAL_MS, POLL_CONCURRENCY,
RPC_TIMEOUT_MS, SUBMIT_MAX_ATTEMPTS, CONFIRM_MAX_ATTEMPTS,
RETRY_BASE_DELAY_MS, RETRY_MAX_DELAY_MS, LOG_LEVEL, NODE_ENV.
`;

export type ParsedArgs =
  | { readonly kind: "run"; readonly mode: EngineMode }
  | { readonly kind: "help" }
  | { readonly kind: "usage-error"; readonly message: string };

const MODE_FLAGS = {
  "init-dist": "init-dist",
  "cont-fund": "cont-fund",
  reclaim: "reclaim",
  status: "status",
} as const satisfies Record<string, EngineMode>;

function parseFlags(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      "init-dist": { type: "boolean" },
      "cont-fund": { type: "boolean" },
      reclaim: { type: "boolean" },
      status: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  }).values;
}

export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(argv);
  } catch (err: unknown) {
    return { kind: "usage-error", message: err instanceof Error ? err.message : String(err) };
  }

  if (values.help) {
    return { kind: "help" };
  }

  const modes = Object.values(MODE_FLAGS).filter((flag) => values[flag] === true);
  const [mode, ...extra] = modes;
  if (mode === undefined) {
    return { kind: "usage-error", message: "No mode given" };
  }
  if (extra.length > 0) {
    return {
      kind: "usage-error",
      message: `Modes are mutually exclusive: ${modes.map((m) => `--${m}`).join(", ")}`,
    };
  }
  return { kind: "run", mode };
}
