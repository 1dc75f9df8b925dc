import { test, afterEach } from "node:test";
import assert from "node:assert/strict";
import { findMissingEnv, loadEnv, readDiscordWebhookUrl } from "../../src/config/env";
import { DEFAULT_CONFIG } from "../../src/constants/relay.constants";
import { ConfigurationError } from "../../src/errors/app.errors";

const baseEnv = {
  WEBHOOK_SECRET: "test-secret",
  EXCHANGE_PRIVATE_KEY: "test-private-key",
  WALLET_ADDRESS: "0xwallet",
  DISCORD_WEBHOOK_URL: "http://localhost/discord-hook",
};

const RELAY_KEYS = [
  ...Object.keys(baseEnv),
  "TRADINGVIEW_SECRET",
  "HYPE_API_SECRET",
  "SYMBOL",
  "LEVERAGE",
  "QUOTE_CURRENCY",
  "MIN_BALANCE",
  "PORT",
  "SERIALIZE_ORDERS",
  "EXCHANGE_SANDBOX",
  "NOTIFICATION_NAME",
];

const originalEnv = { ...process.env };

const resetEnv = () => {
  process.env = { ...originalEnv };
  for (const key of RELAY_KEYS) {
    delete process.env[key];
    delete process.env[key.toLowerCase()];
  }
};

afterEach(() => {
  process.env = { ...originalEnv };
});

test("loadEnv applies defaults for optional values", () => {
  resetEnv();
  Object.assign(process.env, baseEnv);

  const env = loadEnv();
  assert.equal(env.webhookSecret, "test-secret");
  assert.equal(env.exchangePrivateKey, "test-private-key");
  assert.equal(env.walletAddress, "0xwallet");
  assert.equal(env.discordWebhookUrl, "http://localhost/discord-hook");
  assert.equal(env.defaultSymbol, DEFAULT_CONFIG.SYMBOL);
  assert.equal(env.leverage, 5);
  assert.equal(env.quoteCurrency, "USDC");
  assert.equal(env.minBalance, 0);
  assert.equal(env.port, 3000);
  assert.equal(env.serializeOrders, true);
  assert.equal(env.sandbox, false);
  assert.equal(env.notificationName, "Webhook Relay");
});

test("loadEnv reads optional overrides", () => {
  resetEnv();
  Object.assign(process.env, baseEnv, {
    SYMBOL: "ETH/USDC:USDC",
    LEVERAGE: "3",
    QUOTE_CURRENCY: "usdc",
    MIN_BALANCE: "12.5",
    PORT: "8080",
    SERIALIZE_ORDERS: "false",
    EXCHANGE_SANDBOX: "1",
  });

  const env = loadEnv();
  assert.equal(env.defaultSymbol, "ETH/USDC:USDC");
  assert.equal(env.leverage, 3);
  assert.equal(env.quoteCurrency, "USDC");
  assert.equal(env.minBalance, 12.5);
  assert.equal(env.port, 8080);
  assert.equal(env.serializeOrders, false);
  assert.equal(env.sandbox, true);
});

test("loadEnv accepts legacy names for the secret and the private key", () => {
  resetEnv();
  Object.assign(process.env, {
    TRADINGVIEW_SECRET: "legacy-secret",
    HYPE_API_SECRET: "legacy-key",
    WALLET_ADDRESS: "0xwallet",
    DISCORD_WEBHOOK_URL: "http://localhost/discord-hook",
  });

  const env = loadEnv();
  assert.equal(env.webhookSecret, "legacy-secret");
  assert.equal(env.exchangePrivateKey, "legacy-key");
});

test("loadEnv lists every missing required variable", () => {
  resetEnv();
  Object.assign(process.env, { WALLET_ADDRESS: "0xwallet" });

  assert.throws(
    () => loadEnv(),
    (err: unknown) => {
      assert.ok(err instanceof ConfigurationError);
      assert.deepEqual(err.missing, [
        "WEBHOOK_SECRET",
        "EXCHANGE_PRIVATE_KEY",
        "DISCORD_WEBHOOK_URL",
      ]);
      assert.equal(
        err.message,
        "Missing required env vars: WEBHOOK_SECRET, EXCHANGE_PRIVATE_KEY, DISCORD_WEBHOOK_URL",
      );
      return true;
    },
  );
});

test("blank values count as missing", () => {
  resetEnv();
  Object.assign(process.env, baseEnv, { WEBHOOK_SECRET: "   " });

  assert.deepEqual(findMissingEnv(), ["WEBHOOK_SECRET"]);
});

test("loadEnv rejects a leverage that is not a positive integer", () => {
  for (const leverage of ["0", "2.5", "-3", "five"]) {
    resetEnv();
    Object.assign(process.env, baseEnv, { LEVERAGE: leverage });
    assert.throws(() => loadEnv(), ConfigurationError, `LEVERAGE=${leverage}`);
  }
});

test("loadEnv rejects a negative minimum balance", () => {
  resetEnv();
  Object.assign(process.env, baseEnv, { MIN_BALANCE: "-1" });

  assert.throws(() => loadEnv(), /MIN_BALANCE must be a non-negative number/);
});

test("loadEnv rejects an unreadable boolean", () => {
  resetEnv();
  Object.assign(process.env, baseEnv, { SERIALIZE_ORDERS: "maybe" });

  assert.throws(() => loadEnv(), /Invalid boolean value: maybe/);
});

test("readDiscordWebhookUrl works without the rest of the configuration", () => {
  resetEnv();
  Object.assign(process.env, { DISCORD_WEBHOOK_URL: "http://localhost/discord-hook" });

  assert.equal(readDiscordWebhookUrl(), "http://localhost/discord-hook");
  assert.throws(() => loadEnv(), ConfigurationError);
});
