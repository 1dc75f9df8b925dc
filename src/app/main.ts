import "dotenv/config";
import { loadEnv, readDiscordWebhookUrl, type RelayEnv } from "../config/env";
import { DEFAULT_CONFIG } from "../constants/relay.constants";
import { ConfigurationError } from "../errors/app.errors";
import { DiscordNotifierService } from "../services/discord-notifier.service";
import { CcxtExchangeGateway } from "../services/exchange-gateway.service";
import { WebhookRelayService } from "../services/webhook-relay.service";
import { ConsoleLogger, type Logger } from "../utils/logger.util";
import { describeError } from "../utils/sanitize-error.util";
import { RelayLifecycle } from "./lifecycle";
import { createWebhookApp } from "./server";

// Global reference for graceful shutdown
let lifecycle: RelayLifecycle | undefined;

/**
 * Report a broken configuration to chat when at least the webhook URL is known
 */
async function reportConfigurationError(err: ConfigurationError, logger: Logger): Promise<void> {
  logger.error(`🚨 ${err.message}`);
  const webhookUrl = readDiscordWebhookUrl();
  if (!webhookUrl) return;
  const notifier = new DiscordNotifierService(
    {
      webhookUrl,
      notificationName: process.env.NOTIFICATION_NAME || DEFAULT_CONFIG.NOTIFICATION_NAME,
    },
    logger,
  );
  await notifier.send({ type: "CONFIG_INVALID", message: err.message });
}

async function main(): Promise<void> {
  const logger = new ConsoleLogger();

  let env: RelayEnv;
  try {
    env = loadEnv();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      await reportConfigurationError(err, logger);
      process.exit(1);
    }
    throw err;
  }

  const secrets = [env.webhookSecret, env.exchangePrivateKey];
  logger.info(
    `🚀 Starting webhook relay (symbol: ${env.defaultSymbol}, leverage: ${env.leverage}x, serialize: ${env.serializeOrders ? "ON" : "OFF"})`,
  );

  const notifier = new DiscordNotifierService(
    { webhookUrl: env.discordWebhookUrl, notificationName: env.notificationName },
    logger,
  );
  const gateway = new CcxtExchangeGateway(
    {
      walletAddress: env.walletAddress,
      privateKey: env.exchangePrivateKey,
      sandbox: env.sandbox,
      defaultSymbol: env.defaultSymbol,
      defaultLeverage: env.leverage,
      quoteCurrency: env.quoteCurrency,
    },
    logger,
  );
  const relay = new WebhookRelayService(
    {
      webhookSecret: env.webhookSecret,
      defaultSymbol: env.defaultSymbol,
      leverage: env.leverage,
      quoteCurrency: env.quoteCurrency,
      minBalance: env.minBalance,
      serializeOrders: env.serializeOrders,
      secrets,
    },
    gateway,
    notifier,
    logger,
  );

  lifecycle = new RelayLifecycle({
    gateway,
    notifier,
    logger,
    app: createWebhookApp({ relay, notifier, logger, secrets }),
    port: env.port,
    symbol: env.defaultSymbol,
    leverage: env.leverage,
    secrets,
  });

  await lifecycle.start();
}

/**
 * Graceful shutdown handler - close the session and report before exit
 */
function gracefulShutdown(signal: string): void {
  console.log(`\n[Shutdown] Received ${signal}, cleaning up...`);
  if (!lifecycle) {
    process.exit(0);
  }
  lifecycle
    .stop(signal)
    .then(() => process.exit(0))
    .catch((err) => {
      console.error(`[Shutdown] ❌ ${describeError(err)}`);
      process.exit(1);
    });
}

// Handle graceful shutdown signals
process.on("SIGINT", () => gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));

// Handle unhandled promise rejections (async errors)
process.on("unhandledRejection", (reason) => {
  console.error(`[UnhandledRejection] ❌ ${describeError(reason)}`);
});

// Handle uncaught exceptions (sync errors)
process.on("uncaughtException", (error) => {
  console.error(`[UncaughtException] ❌ Uncaught exception:`, error);
  // Give time for logs to flush
  setTimeout(() => process.exit(1), 1000);
});

main().catch((err) => {
  console.error(`Fatal error in main(): ${describeError(err)}`);
  process.exit(1);
});
