/**
 * Scoped transaction signer.
 *
 * Wraps a derived private key in a viem local account for the lifetime of
 * a single `withSigner` call. Produces EIP-1559 value transfers whose hash
 * is known before submission.
 */

import { keccak256, toHex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { Address } from "@hd-funder/types";
import type {
  SignedTransaction,
  TransactionSigner,
  TransferRequest,
} from "@hd-funder/chain-client";

export function createTransferSigner(
  privateKey: Uint8Array,
  chainId: number,
): TransactionSigner {
  const account = privateKeyToAccount(toHex(privateKey));
  const address: Address = account.address;

  return {
    address,
    async signTransfer(request: TransferRequest): Promise<SignedTransaction> {
      const serialized = await account.signTransaction({
        type: "eip1559",
        chainId,
        to: request.to,
        value: request.value,
        nonce: request.nonce,
        gas: request.fee.gasLimit,
        maxFeePerGas: request.fee.maxFeePerGas,
        maxPriorityFeePerGas: request.fee.maxPriorityFeePerGas,
      });
      return {
        from: address,
        to: request.to,
        value: request.value,
        nonce: request.nonce,
        hash: keccak256(serialized),
        serialized,
      };
    },
  };
}
