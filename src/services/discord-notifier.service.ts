/**
 * Discord Notification Service
 *
 * Posts short status messages to a Discord channel webhook when:
 * - The relay comes online or shuts down
 * - An order is executed, or a FLAT finds nothing to close
 * - An alert is skipped for insufficient balance
 * - An order or the relay itself fails
 *
 * Delivery is best-effort: no retries, failures are logged and never reach the
 * webhook caller.
 *
 * Configuration via environment variables:
 * - DISCORD_WEBHOOK_URL: Channel webhook URL
 * - NOTIFICATION_NAME: Name shown at the top of each message (default: "Webhook Relay")
 */

import axios, { type AxiosInstance } from "axios";
import { DEFAULT_CONFIG } from "../constants/relay.constants";
import type { AlertAction } from "../domain/alert.types";
import type { NotificationEvent } from "../domain/notification.types";
import type { Logger } from "../utils/logger.util";
import { truncate } from "../utils/sanitize-error.util";
import type { NotificationService } from "./interfaces";

/**
 * Discord configuration
 */
export interface DiscordConfig {
  /** Channel webhook URL (contains the webhook token; never logged) */
  webhookUrl: string;
  /** Custom notification name (default: "Webhook Relay") */
  notificationName: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Enable/disable notifications */
  enabled: boolean;
}

/**
 * Default Discord configuration
 */
export const DEFAULT_DISCORD_CONFIG: DiscordConfig = {
  webhookUrl: "",
  notificationName: DEFAULT_CONFIG.NOTIFICATION_NAME,
  timeoutMs: DEFAULT_CONFIG.NOTIFICATION_TIMEOUT_MS,
  enabled: false,
};

/**
 * Discord Notification Service
 */
export class DiscordNotifierService implements NotificationService {
  private readonly config: DiscordConfig;
  private readonly logger: Logger;
  private readonly http: AxiosInstance;
  private readonly pending = new Set<Promise<boolean>>();

  constructor(
    config: Partial<DiscordConfig>,
    logger: Logger,
    http: AxiosInstance = axios.create(),
  ) {
    this.config = {
      ...DEFAULT_DISCORD_CONFIG,
      ...config,
      enabled: Boolean(config.webhookUrl),
    };
    this.logger = logger;
    this.http = http;

    if (this.config.enabled) {
      this.logger.info(
        `[Discord] ✅ Notifications enabled (name: "${this.config.notificationName}")`,
      );
    } else {
      this.logger.warn("[Discord] ⚠️ No webhook URL; notifications disabled");
    }
  }

  /**
   * Check if notifications are enabled
   */
  isEnabled(): boolean {
    return this.config.enabled;
  }

  notify(event: NotificationEvent): void {
    const delivery = this.send(event).finally(() => {
      this.pending.delete(delivery);
    });
    this.pending.add(delivery);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  async send(event: NotificationEvent): Promise<boolean> {
    if (!this.config.enabled) {
      this.logger.debug(`[Discord] Skipping ${event.type} (disabled)`);
      return false;
    }

    const content = truncate(
      formatNotification(event, this.config.notificationName),
      DEFAULT_CONFIG.DISCORD_MAX_CONTENT_LENGTH,
    );

    try {
      await this.http.post(
        this.config.webhookUrl,
        // Error text must never ping @everyone or a role
        { content, allowed_mentions: { parse: [] } },
        { timeout: this.config.timeoutMs },
      );
      this.logger.debug(`[Discord] ${event.type} sent`);
      return true;
    } catch (err) {
      this.logger.error(
        `[Discord] Failed to send ${event.type}: ${describeDeliveryError(err)}`,
      );
      return false;
    }
  }
}

/**
 * Status code or message of a failed webhook call. The request config is left
 * out because the URL carries the webhook token.
 */
function describeDeliveryError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) {
      return `HTTP ${err.response.status}`;
    }
    return err.code ?? err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Escape Discord markdown control characters
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([\\*_~`|>])/g, "\\$1");
}

/**
 * Price with two decimals, as quoted in alerts
 */
export function formatPrice(price: number): string {
  return price.toFixed(2);
}

/**
 * Base-asset amount without trailing zeros (0.10000000 -> 0.1)
 */
export function formatAmount(amount: number): string {
  return String(Number(amount.toFixed(8)));
}

/**
 * Get emoji for an alert action
 */
export function getActionEmoji(action: AlertAction): string {
  switch (action) {
    case "BUY":
      return "🟢";
    case "SELL":
      return "🔴";
    case "FLAT":
      return "⚪";
  }
}

export function formatNotification(
  event: NotificationEvent,
  notificationName: string,
): string {
  const name = `**${escapeMarkdown(notificationName)}**`;

  switch (event.type) {
    case "SERVICE_STARTED":
      return `✅ ${name} online\nTrading ${event.symbol} at ${event.leverage}x`;
    case "SERVICE_STOPPED":
      return `🛑 ${name} shutting down (${escapeMarkdown(event.reason)})`;
    case "ORDER_EXECUTED":
      return (
        `${getActionEmoji(event.action)} ${name}\n` +
        `${event.symbol} ${event.action} ${formatPrice(event.price)}\n` +
        `Market ${event.side} ${formatAmount(event.amount)} filled (order ${escapeMarkdown(event.orderId)})`
      );
    case "NOTHING_TO_CLOSE":
      return `${getActionEmoji("FLAT")} ${name}\n${event.symbol} FLAT ${formatPrice(event.price)}\nNo open position to close`;
    case "INSUFFICIENT_BALANCE":
      return (
        `⚠️ ${name}\n` +
        `${event.symbol} ${event.action} skipped: insufficient balance ` +
        `(free ${event.available.toFixed(6)}, minimum ${event.minimum})`
      );
    case "ORDER_FAILED":
      return `❌ ${name}\n${event.symbol} ${event.action} failed: ${escapeMarkdown(event.message)}`;
    case "UNHANDLED_ERROR":
      return `⚠️ ${name} ERROR: ${escapeMarkdown(event.message)}`;
    case "CONFIG_INVALID":
      return `🚨 ${name} ${escapeMarkdown(event.message)}`;
    case "STARTUP_FAILED":
      return `🚨 ${name} failed to start: ${escapeMarkdown(event.message)}`;
  }
}
