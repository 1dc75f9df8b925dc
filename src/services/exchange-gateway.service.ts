/**
 * Exchange Gateway
 *
 * ccxt-backed session against Hyperliquid perpetuals. One instance is opened
 * at startup and shared by every request. Any failure coming out of ccxt is
 * rethrown as ExchangeError so callers handle a single error type.
 *
 * Hyperliquid specifics:
 * - Credentials are the API wallet's private key plus the account address
 * - Balance and position reads take the account address as `user`
 * - Market orders need a reference price to bound slippage
 */

import { hyperliquid, InvalidOrder } from "ccxt";
import type { OrderFill, OrderPlan } from "../domain/alert.types";
import { ExchangeError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import type { ExchangeGateway } from "./interfaces";

export interface CcxtGatewayConfig {
  walletAddress: string;
  privateKey: string;
  /** Use the exchange testnet */
  sandbox: boolean;
  /** Leverage applied to the default symbol when the session opens */
  defaultSymbol: string;
  defaultLeverage: number;
  /** Currency whose balance is read to verify the session */
  quoteCurrency: string;
}

type BalanceEntry = {
  free?: number | null;
  used?: number | null;
  total?: number | null;
};

type OrderEntry = {
  id?: string | null;
  average?: number | null;
  price?: number | null;
  filled?: number | null;
};

type PositionEntry = {
  symbol?: string | null;
  contracts?: number | null;
  side?: string | null;
};

const isPositiveFinite = (value: number | null | undefined): value is number =>
  typeof value === "number" && Number.isFinite(value) && value > 0;

/**
 * Free balance of one currency entry. Falls back to total - used when the
 * exchange reports no free amount.
 */
export function freeBalance(entry: BalanceEntry | undefined): number {
  if (!entry) return 0;
  if (typeof entry.free === "number" && Number.isFinite(entry.free)) {
    return entry.free;
  }
  const total = entry.total ?? 0;
  const used = entry.used ?? 0;
  return Number.isFinite(total - used) ? total - used : 0;
}

/**
 * Signed size of the open position on a symbol: long > 0, short < 0.
 */
export function signedPositionSize(
  positions: readonly PositionEntry[],
  symbol: string,
): number {
  for (const position of positions) {
    if (position.symbol !== symbol) continue;
    const contracts = position.contracts ?? 0;
    if (!Number.isFinite(contracts) || contracts === 0) continue;
    const size = Math.abs(contracts);
    return position.side === "short" ? -size : size;
  }
  return 0;
}

/**
 * What actually happened to a submitted market order, falling back to the plan
 * for anything the exchange left out.
 */
export function fillFromOrder(
  order: OrderEntry,
  plan: OrderPlan,
): OrderFill {
  const price = [order.average, order.price, plan.referencePrice].find(
    isPositiveFinite,
  );
  return {
    orderId: order.id || "unknown",
    symbol: plan.symbol,
    side: plan.side,
    amount: isPositiveFinite(order.filled) ? order.filled : plan.amount,
    price: price ?? plan.referencePrice,
  };
}

function createExchange(config: CcxtGatewayConfig): hyperliquid {
  const exchange = new hyperliquid({
    walletAddress: config.walletAddress,
    privateKey: config.privateKey,
    enableRateLimit: true,
  });
  if (config.sandbox) {
    exchange.setSandboxMode(true);
  }
  return exchange;
}

export class CcxtExchangeGateway implements ExchangeGateway {
  private readonly exchange: hyperliquid;
  private readonly config: CcxtGatewayConfig;
  private readonly logger: Logger;
  private readonly appliedLeverage = new Map<string, number>();
  private opened = false;
  private closed = false;

  constructor(config: CcxtGatewayConfig, logger: Logger, exchange?: hyperliquid) {
    this.config = config;
    this.logger = logger;
    this.exchange = exchange ?? createExchange(config);
  }

  async open(): Promise<void> {
    if (this.opened) return;

    await this.call("loadMarkets", undefined, () => this.exchange.loadMarkets());
    await this.call("checkCredentials", undefined, async () => {
      this.exchange.checkRequiredCredentials();
    });
    const { quoteCurrency } = this.config;
    const balance = await this.fetchAvailableBalance(quoteCurrency);
    this.logger.info(
      `[Exchange] ✅ Session open (${this.exchange.id}${this.config.sandbox ? ", testnet" : ""}); free ${quoteCurrency} ${balance.toFixed(2)}`,
    );

    await this.applyLeverage(this.config.defaultSymbol, this.config.defaultLeverage);
    this.opened = true;
  }

  async fetchAvailableBalance(currency: string): Promise<number> {
    const balances = await this.call("fetchBalance", undefined, () =>
      this.exchange.fetchBalance({ type: "swap", user: this.config.walletAddress }),
    );
    const entry: BalanceEntry | undefined = balances[currency];
    return freeBalance(entry);
  }

  async fetchPositionSize(symbol: string): Promise<number> {
    const positions = await this.call("fetchPositions", symbol, () =>
      this.exchange.fetchPositions([symbol], { user: this.config.walletAddress }),
    );
    return signedPositionSize(positions, symbol);
  }

  async fetchMarkPrice(symbol: string): Promise<number> {
    const ticker = await this.call("fetchTicker", symbol, () =>
      this.exchange.fetchTicker(symbol),
    );
    const price = [ticker.markPrice, ticker.last, ticker.close].find(isPositiveFinite);
    if (price === undefined) {
      throw new ExchangeError(`No usable price for ${symbol}`, "fetchTicker", symbol);
    }
    return price;
  }

  amountToPrecision(symbol: string, amount: number): number {
    try {
      const minimum = this.exchange.market(symbol).limits.amount?.min;
      const truncated = Number(this.exchange.amountToPrecision(symbol, amount));
      if (!Number.isFinite(truncated)) return 0;
      if (typeof minimum === "number" && truncated < minimum) return 0;
      return truncated;
    } catch (err) {
      // ccxt refuses amounts that truncate to zero
      if (err instanceof InvalidOrder) return 0;
      throw this.wrap("amountToPrecision", symbol, err);
    }
  }

  async placeMarketOrder(plan: OrderPlan): Promise<OrderFill> {
    if (!plan.reduceOnly) {
      await this.applyLeverage(plan.symbol, plan.leverage);
    }

    this.logger.info(
      `[Exchange] Submitting market ${plan.side} ${plan.amount} ${plan.symbol}${plan.reduceOnly ? " (reduce-only)" : ""}`,
    );
    const order = await this.call("createOrder", plan.symbol, () =>
      this.exchange.createOrder(
        plan.symbol,
        "market",
        plan.side,
        plan.amount,
        plan.referencePrice,
        { reduceOnly: plan.reduceOnly },
      ),
    );
    return fillFromOrder(order, plan);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.call("close", undefined, () => this.exchange.close());
    this.logger.info("[Exchange] Session closed");
  }

  /**
   * Leverage is set once per symbol and value. A failure is logged and the
   * order proceeds with whatever leverage the account already has.
   */
  private async applyLeverage(symbol: string, leverage: number): Promise<void> {
    if (this.appliedLeverage.get(symbol) === leverage) return;
    try {
      await this.exchange.setLeverage(leverage, symbol);
      this.appliedLeverage.set(symbol, leverage);
      this.logger.debug(`[Exchange] Leverage ${leverage}x set on ${symbol}`);
    } catch (err) {
      this.logger.warn(
        `[Exchange] ⚠️ Could not set leverage ${leverage}x on ${symbol}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private async call<T>(
    operation: string,
    symbol: string | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.wrap(operation, symbol, err);
    }
  }

  private wrap(operation: string, symbol: string | undefined, err: unknown): ExchangeError {
    if (err instanceof ExchangeError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ExchangeError(
      `${operation}${symbol ? ` ${symbol}` : ""} failed: ${message}`,
      operation,
      symbol,
      err instanceof Error ? err : undefined,
    );
  }
}
