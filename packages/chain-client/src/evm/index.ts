export { EvmChainClient } from "./evm-client.js";
export { translateViemError } from "./translate-error.js";
