/**
 * Ethers v6 → v5 compatibility
 *
 * @polymarket/clob-client signs with the ethers v5 signer interface
 * (`_signTypedData`). This project uses ethers v6, which names the method
 * `signTypedData`.
 */

import type { ClobClient } from "@polymarket/clob-client";
import type { Wallet } from "ethers";

export type ClobSigner = NonNullable<ConstructorParameters<typeof ClobClient>[2]>;

type TypedDataFn = Wallet["signTypedData"];

/**
 * Add `_signTypedData` to a v6 wallet and hand it over as a v5 signer
 */
export function toClobSigner(wallet: Wallet): ClobSigner {
  const shimmed: Wallet & { _signTypedData?: TypedDataFn } = wallet;
  if (typeof shimmed._signTypedData !== "function") {
    shimmed._signTypedData = wallet.signTypedData.bind(wallet);
  }
  // The SDK only calls _signTypedData and getAddress
  return shimmed as unknown as ClobSigner;
}
