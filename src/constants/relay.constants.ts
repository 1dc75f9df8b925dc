/**
 * Accepted alert actions. Matching is case-insensitive.
 */
export const ALERT_ACTIONS = ["BUY", "SELL", "FLAT"] as const;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  /** Hyperliquid USDC-margined BTC perpetual */
  SYMBOL: "BTC/USDC:USDC",
  LEVERAGE: 5,
  QUOTE_CURRENCY: "USDC",
  /** Free balance at or below this is treated as nothing to trade with */
  MIN_BALANCE: 0,
  PORT: 3000,
  NOTIFICATION_NAME: "Webhook Relay",
  NOTIFICATION_TIMEOUT_MS: 5000,
  /** Discord rejects message content longer than this */
  DISCORD_MAX_CONTENT_LENGTH: 2000,
  /** Error descriptions sent to chat are clipped to this many characters */
  ERROR_DESCRIPTION_MAX_LENGTH: 300,
} as const;
