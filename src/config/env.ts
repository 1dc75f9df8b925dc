import { DEFAULT_CONFIG } from "../constants/relay.constants";
import { ConfigurationError } from "../errors/app.errors";

export type RelayEnv = {
  webhookSecret: string;
  exchangePrivateKey: string;
  walletAddress: string;
  discordWebhookUrl: string;
  defaultSymbol: string;
  leverage: number;
  quoteCurrency: string;
  minBalance: number;
  port: number;
  /** Serialize planning + submission per symbol */
  serializeOrders: boolean;
  /** Route exchange calls to the testnet */
  sandbox: boolean;
  notificationName: string;
};

type RequiredKey = {
  name: string;
  aliases: readonly string[];
};

const REQUIRED_KEYS = {
  webhookSecret: { name: "WEBHOOK_SECRET", aliases: ["TRADINGVIEW_SECRET"] },
  exchangePrivateKey: { name: "EXCHANGE_PRIVATE_KEY", aliases: ["HYPE_API_SECRET"] },
  walletAddress: { name: "WALLET_ADDRESS", aliases: [] },
  discordWebhookUrl: { name: "DISCORD_WEBHOOK_URL", aliases: [] },
} as const satisfies Record<string, RequiredKey>;

const read = (key: string): string | undefined => {
  const value = process.env[key] ?? process.env[key.toLowerCase()];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

const readWithAliases = (key: RequiredKey): string | undefined => {
  for (const name of [key.name, ...key.aliases]) {
    const value = read(name);
    if (value !== undefined) return value;
  }
  return undefined;
};

const parseBoolean = (raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  throw new ConfigurationError(`Invalid boolean value: ${raw}`);
};

const parsePositiveInteger = (name: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${name} must be a positive integer (got "${raw}")`);
  }
  return parsed;
};

const parseNonNegative = (name: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number (got "${raw}")`);
  }
  return parsed;
};

/**
 * Name of every required variable that is unset (canonical names only).
 */
export function findMissingEnv(): string[] {
  return Object.values(REQUIRED_KEYS)
    .filter((key) => readWithAliases(key) === undefined)
    .map((key) => key.name);
}

/**
 * The chat webhook, if one is configured. Used to report a broken configuration
 * before the rest of the environment can be loaded.
 */
export function readDiscordWebhookUrl(): string | undefined {
  return readWithAliases(REQUIRED_KEYS.discordWebhookUrl);
}

export function loadEnv(): RelayEnv {
  const missing = findMissingEnv();
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required env vars: ${missing.join(", ")}`,
      missing,
    );
  }

  const required = (key: RequiredKey): string => {
    const value = readWithAliases(key);
    if (value === undefined) {
      throw new ConfigurationError(`Missing required env var: ${key.name}`, [key.name]);
    }
    return value;
  };

  const env: RelayEnv = {
    webhookSecret: required(REQUIRED_KEYS.webhookSecret),
    exchangePrivateKey: required(REQUIRED_KEYS.exchangePrivateKey),
    walletAddress: required(REQUIRED_KEYS.walletAddress),
    discordWebhookUrl: required(REQUIRED_KEYS.discordWebhookUrl),
    defaultSymbol: read("SYMBOL") ?? DEFAULT_CONFIG.SYMBOL,
    leverage: parsePositiveInteger("LEVERAGE", read("LEVERAGE"), DEFAULT_CONFIG.LEVERAGE),
    quoteCurrency: (read("QUOTE_CURRENCY") ?? DEFAULT_CONFIG.QUOTE_CURRENCY).toUpperCase(),
    minBalance: parseNonNegative("MIN_BALANCE", read("MIN_BALANCE"), DEFAULT_CONFIG.MIN_BALANCE),
    port: parsePositiveInteger("PORT", read("PORT"), DEFAULT_CONFIG.PORT),
    serializeOrders: parseBoolean(read("SERIALIZE_ORDERS"), true),
    sandbox: parseBoolean(read("EXCHANGE_SANDBOX"), false),
    notificationName: read("NOTIFICATION_NAME") ?? DEFAULT_CONFIG.NOTIFICATION_NAME,
  };

  return Object.freeze(env);
}
