import { Wallet } from "ethers";
import { ClobClient, type ApiKeyCreds } from "@polymarket/clob-client";
import { ConfigurationError } from "../errors/app.errors";
import { formatErrorForLog } from "../lib/error-handling";
import type { Logger } from "../utils/logger.util";

export type CreateClientInput = {
  host: string;
  chainId: number;
  privateKey: string;
  apiKey?: string;
  apiSecret?: string;
  apiPassphrase?: string;
  /** 0 = EOA, 1 = Poly proxy, 2 = Gnosis safe */
  signatureType: number;
  funderAddress?: string;
  logger?: Logger;
};

const explicitCreds = (input: CreateClientInput): ApiKeyCreds | undefined =>
  input.apiKey && input.apiSecret && input.apiPassphrase
    ? { key: input.apiKey, secret: input.apiSecret, passphrase: input.apiPassphrase }
    : undefined;

/**
 * Authenticated CLOB client. Uses the configured API credentials, or derives
 * them from the wallet signature when none are set.
 */
export async function createClobClient(input: CreateClientInput): Promise<ClobClient> {
  let wallet: Wallet;
  try {
    wallet = new Wallet(input.privateKey);
  } catch (err) {
    throw new ConfigurationError(
      "PRIVATE_KEY is not a valid private key",
      "PRIVATE_KEY",
      err instanceof Error ? err : undefined,
    );
  }

  let creds = explicitCreds(input);
  if (!creds) {
    const bootstrap = new ClobClient(input.host, input.chainId, wallet);
    try {
      creds = await bootstrap.createOrDeriveApiKey();
    } catch (err) {
      throw new ConfigurationError(
        `Failed to derive CLOB API credentials: ${formatErrorForLog(err, 200)}`,
        "POLYMARKET_API_KEY",
        err instanceof Error ? err : undefined,
      );
    }
    input.logger?.info("[CLOB] API credentials derived via wallet signature");
  }

  input.logger?.info(
    `[CLOB] signer=${wallet.address} signatureType=${input.signatureType} funder=${input.funderAddress ?? "none"}`,
  );
  return new ClobClient(
    input.host,
    input.chainId,
    wallet,
    creds,
    input.signatureType,
    input.funderAddress,
  );
}
