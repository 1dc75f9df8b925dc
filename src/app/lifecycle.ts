import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Express } from "express";
import type { ExchangeGateway, NotificationService } from "../services/interfaces";
import type { Logger } from "../utils/logger.util";
import { describeError } from "../utils/sanitize-error.util";

export interface LifecycleDeps {
  gateway: ExchangeGateway;
  notifier: NotificationService;
  logger: Logger;
  app: Express;
  port: number;
  /** Shown in the online notification */
  symbol: string;
  leverage: number;
  secrets: readonly string[];
  /** Bind address; all interfaces when omitted */
  host?: string;
}

/**
 * Startup and shutdown of the relay.
 *
 * The exchange session is opened before the port is bound, so no alert is
 * ever accepted without an authenticated session. Shutdown always runs to
 * the end, even when closing the session fails.
 */
export class RelayLifecycle {
  private server: Server | undefined;
  private stopping: Promise<void> | undefined;

  constructor(private readonly deps: LifecycleDeps) {}

  /**
   * Resolves with the bound port. Rejects (after notifying) when the exchange
   * session cannot be opened or the port cannot be bound; in the latter case
   * the session is closed first.
   */
  async start(): Promise<number> {
    const { gateway, notifier, logger } = this.deps;

    logger.info("[Lifecycle] 🔐 Opening exchange session...");
    try {
      await gateway.open();
    } catch (err) {
      const message = describeError(err, this.deps.secrets);
      logger.error(`[Lifecycle] ❌ Exchange session failed: ${message}`);
      await notifier.send({ type: "STARTUP_FAILED", message });
      throw err;
    }

    let port: number;
    try {
      port = await this.listen();
    } catch (err) {
      const message = describeError(err, this.deps.secrets);
      logger.error(`[Lifecycle] ❌ Cannot listen on port ${this.deps.port}: ${message}`);
      await this.closeGateway();
      await notifier.send({ type: "STARTUP_FAILED", message });
      throw err;
    }
    logger.info(`[Lifecycle] 🚀 Listening on port ${port} (POST /webhook)`);
    await notifier.send({
      type: "SERVICE_STARTED",
      symbol: this.deps.symbol,
      leverage: this.deps.leverage,
    });
    return port;
  }

  /**
   * Idempotent; concurrent calls share one shutdown.
   */
  stop(reason: string): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason);
    }
    return this.stopping;
  }

  private async shutdown(reason: string): Promise<void> {
    const { notifier, logger } = this.deps;
    logger.info(`[Lifecycle] Shutting down (${reason})...`);

    try {
      await this.closeServer();
    } catch (err) {
      logger.warn(`[Lifecycle] ⚠️ HTTP server close failed: ${describeError(err)}`);
    }

    await this.closeGateway();

    await notifier.send({ type: "SERVICE_STOPPED", reason });
    await notifier.flush();
    logger.info("[Lifecycle] Shutdown complete");
  }

  /** Failures are logged only */
  private async closeGateway(): Promise<void> {
    try {
      await this.deps.gateway.close();
    } catch (err) {
      this.deps.logger.warn(
        `[Lifecycle] ⚠️ Exchange session close failed: ${describeError(err, this.deps.secrets)}`,
      );
    }
  }

  private listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.deps.app.listen(this.deps.port, this.deps.host ?? "0.0.0.0");
      server.once("error", reject);
      server.once("listening", () => {
        server.off("error", reject);
        this.server = server;
        const address = server.address();
        resolve(isAddressInfo(address) ? address.port : this.deps.port);
      });
    });
  }

  private closeServer(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}
