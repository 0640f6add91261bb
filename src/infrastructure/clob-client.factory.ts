/**
 * CLOB Client Factory
 *
 * Builds an authenticated ClobClient for live trading:
 * 1. Wallet from the configured private key
 * 2. Provided API credentials, or createOrDeriveApiKey() when none are set
 * 3. Client with L2 credentials, ready to post orders
 */

import { JsonRpcProvider, Wallet } from "ethers";
import { ClobClient, Chain } from "@polymarket/clob-client";
import type { ApiKeyCreds } from "@polymarket/clob-client";
import type { AuthConfig } from "../config/schema";
import { ConfigurationError } from "../errors/app.errors";
import { toClobSigner } from "../lib/ethers-compat";
import type { Logger } from "../utils/logger.util";

export interface AuthenticatedClobClient {
  client: ClobClient;
  /** L2 credentials, also used to authenticate the user websocket channel */
  creds: ApiKeyCreds;
}

export async function createClobClient(auth: AuthConfig, host: string, logger: Logger): Promise<AuthenticatedClobClient> {
  if (!auth.privateKey) {
    throw new ConfigurationError("PRIVATE_KEY is required when ARMED=true");
  }

  const provider = new JsonRpcProvider(auth.rpcUrl);
  const pk = auth.privateKey.startsWith("0x") ? auth.privateKey : `0x${auth.privateKey}`;
  const wallet = new Wallet(pk, provider);
  const signer = toClobSigner(wallet);
  logger.info(`[ClobClient] Wallet: ${wallet.address.slice(0, 10)}...${wallet.address.slice(-6)}`);

  let creds: ApiKeyCreds;
  if (auth.apiKey && auth.apiSecret && auth.apiPassphrase) {
    creds = { key: auth.apiKey, secret: auth.apiSecret, passphrase: auth.apiPassphrase };
    logger.info("[ClobClient] Using provided API credentials");
  } else {
    logger.info("[ClobClient] Deriving API credentials...");
    creds = await new ClobClient(host, Chain.POLYGON, signer).createOrDeriveApiKey();
    if (!creds.key || !creds.secret || !creds.passphrase) {
      throw new ConfigurationError("Could not derive CLOB API credentials; set POLYMARKET_API_KEY/SECRET/PASSPHRASE");
    }
    logger.info(`[ClobClient] Credentials derived (key: ...${creds.key.slice(-6)})`);
  }

  return { client: new ClobClient(host, Chain.POLYGON, signer, creds), creds };
}
