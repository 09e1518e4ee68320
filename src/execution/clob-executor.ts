/**
 * CLOB Executor - live fill-or-kill market orders on Polymarket
 *
 * The ClobClient is reached only through OrderGateway, so response
 * handling can be exercised without a wallet or network.
 */

import { Wallet } from "@ethersproject/wallet";
import {
  AssetType,
  Chain,
  ClobClient,
  OrderType,
  Side,
} from "@polymarket/clob-client";
import type { ApiKeyCreds } from "@polymarket/clob-client";
import { SignatureType } from "@polymarket/order-utils";
import type { Logger } from "../utils/logger.util";
import { ExecutionFailedError, formatError } from "../errors/app.errors";
import type { ExecutionResult, OrderIntent, SellIntent } from "../core/types";
import type { Executor } from "./executor";

// USDC collateral uses 6 decimals on Polygon
const COLLATERAL_DECIMALS = 6;

/**
 * The venue calls the executor needs
 */
export interface OrderGateway {
  /** Sign and post a FOK market BUY; resolves to the raw venue response */
  submitMarketBuy(tokenId: string, amountUsd: number, price: number): Promise<unknown>;
  /** Sign and post a FOK market SELL of `shares` tokens */
  submitMarketSell(tokenId: string, shares: number, price: number): Promise<unknown>;
  /** Raw collateral balance in base units */
  collateralBalance(): Promise<string>;
}

export interface ClobCredentialsConfig {
  host: string;
  chainId: number;
  signatureType: number;
  funderAddress?: string;
  privateKey: string;
  apiKey?: string;
  apiSecret?: string;
  apiPassphrase?: string;
}

export class ClobExecutor implements Executor {
  readonly name = "clob";

  constructor(
    private readonly gateway: OrderGateway,
    private readonly logger: Logger,
  ) {}

  async execute(order: OrderIntent): Promise<ExecutionResult> {
    const response = await this.gateway.submitMarketBuy(
      order.tokenId,
      order.sizeUsd,
      order.price,
    );
    const result = parseOrderResponse(response, order.price);

    if (result.success) {
      this.logger.info(
        `[LIVE] Order ${result.orderId ?? "?"} filled: ${order.side} $${order.sizeUsd.toFixed(2)} in ${order.marketId} @ ${result.fillPrice.toFixed(3)}`,
      );
    } else {
      this.logger.warn(`[LIVE] Order rejected for ${order.marketId}: ${result.error ?? "unknown"}`);
    }
    return result;
  }

  async sell(order: SellIntent): Promise<ExecutionResult> {
    const response = await this.gateway.submitMarketSell(
      order.tokenId,
      order.shares,
      order.price,
    );
    const result = parseOrderResponse(response, order.price, "SELL");

    if (result.success) {
      this.logger.info(
        `[LIVE] Sell ${result.orderId ?? "?"} filled: ${order.shares.toFixed(2)} ${order.side} of ${order.marketId} @ ${result.fillPrice.toFixed(3)}`,
      );
    } else {
      this.logger.warn(`[LIVE] Sell rejected for ${order.positionId}: ${result.error ?? "unknown"}`);
    }
    return result;
  }

  async fetchBalance(): Promise<number> {
    const raw = await this.gateway.collateralBalance();
    const units = Number(raw);
    if (!Number.isFinite(units)) {
      throw new ExecutionFailedError(`Unreadable collateral balance: ${raw}`);
    }
    return units / 10 ** COLLATERAL_DECIMALS;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const positiveNumber = (value: unknown): number | undefined => {
  const n = typeof value === "string" ? Number(value) : value;
  return typeof n === "number" && Number.isFinite(n) && n > 0 ? n : undefined;
};

/**
 * Turn the untyped postOrder response into an ExecutionResult.
 * The client reports HTTP failures as `{ error }` instead of throwing.
 */
export function parseOrderResponse(
  response: unknown,
  requestedPrice: number,
  action: "BUY" | "SELL" = "BUY",
): ExecutionResult {
  if (!isRecord(response)) {
    return { success: false, fillPrice: 0, error: "EMPTY_RESPONSE" };
  }

  if (response.error !== undefined && response.error !== null && response.error !== "") {
    return { success: false, fillPrice: 0, error: String(response.error) };
  }

  const errorMsg =
    typeof response.errorMsg === "string" && response.errorMsg !== ""
      ? response.errorMsg
      : undefined;
  if (response.success === false || errorMsg) {
    return { success: false, fillPrice: 0, error: errorMsg ?? "ORDER_REJECTED" };
  }

  const orderId =
    typeof response.orderID === "string" && response.orderID !== ""
      ? response.orderID
      : undefined;
  if (!orderId) {
    return { success: false, fillPrice: 0, error: "NO_ORDER_ID" };
  }

  // BUY: making = USDC paid, taking = shares received. SELL: the reverse.
  const making = positiveNumber(response.makingAmount);
  const taking = positiveNumber(response.takingAmount);
  let fillPrice = requestedPrice;
  if (making !== undefined && taking !== undefined) {
    fillPrice = action === "BUY" ? making / taking : taking / making;
  }

  return { success: true, fillPrice, orderId };
}

/**
 * OrderGateway backed by a ClobClient
 */
export function createClobGateway(client: ClobClient): OrderGateway {
  return {
    async submitMarketBuy(tokenId, amountUsd, price) {
      const signed = await client.createMarketOrder({
        tokenID: tokenId,
        amount: amountUsd,
        side: Side.BUY,
        price,
      });
      return client.postOrder(signed, OrderType.FOK);
    },
    async submitMarketSell(tokenId, shares, price) {
      const signed = await client.createMarketOrder({
        tokenID: tokenId,
        amount: shares,
        side: Side.SELL,
        price,
      });
      return client.postOrder(signed, OrderType.FOK);
    },
    async collateralBalance() {
      const response = await client.getBalanceAllowance({
        asset_type: AssetType.COLLATERAL,
      });
      return response.balance;
    },
  };
}

export function resolveChain(chainId: number): Chain {
  switch (chainId) {
    case 137:
      return Chain.POLYGON;
    case 80002:
      return Chain.AMOY;
    default:
      throw new ExecutionFailedError(`Unsupported chain id: ${chainId}`);
  }
}

export function resolveSignatureType(value: number): SignatureType {
  switch (value) {
    case 0:
      return SignatureType.EOA;
    case 1:
      return SignatureType.POLY_PROXY;
    case 2:
      return SignatureType.POLY_GNOSIS_SAFE;
    default:
      throw new ExecutionFailedError(`Unsupported signature type: ${value}`);
  }
}

/**
 * Build an authenticated ClobClient, deriving API credentials when
 * none are configured
 */
export async function createClobClient(
  config: ClobCredentialsConfig,
  logger: Logger,
): Promise<ClobClient> {
  const pk = config.privateKey.startsWith("0x")
    ? config.privateKey
    : `0x${config.privateKey}`;
  const wallet = new Wallet(pk);
  const chain = resolveChain(config.chainId);
  const signatureType = resolveSignatureType(config.signatureType);
  logger.info(`[Client] 🔐 Wallet: ${wallet.address.slice(0, 10)}...${wallet.address.slice(-6)}`);

  let creds: ApiKeyCreds;
  if (config.apiKey && config.apiSecret && config.apiPassphrase) {
    logger.info("[Client] 📋 Using provided API credentials");
    creds = {
      key: config.apiKey,
      secret: config.apiSecret,
      passphrase: config.apiPassphrase,
    };
  } else {
    logger.info("[Client] 🔄 Deriving API credentials...");
    try {
      creds = await new ClobClient(config.host, chain, wallet).createOrDeriveApiKey();
    } catch (err) {
      throw new ExecutionFailedError(
        `Failed to derive CLOB credentials: ${formatError(err)}`,
        undefined,
        err instanceof Error ? err : undefined,
      );
    }
    if (!creds.key || !creds.secret || !creds.passphrase) {
      throw new ExecutionFailedError("Derived CLOB credentials are incomplete");
    }
    logger.info(`[Client] ✅ Credentials derived (key: ...${creds.key.slice(-6)})`);
  }

  if (signatureType !== SignatureType.EOA) {
    logger.info(`[Client] Signature type ${config.signatureType}, funder ${config.funderAddress ?? "(none)"}`);
  }
  return new ClobClient(
    config.host,
    chain,
    wallet,
    creds,
    signatureType,
    config.funderAddress,
  );
}
