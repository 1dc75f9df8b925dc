/**
 * HTTP surface
 *
 *   POST /webhook  alert in, order summary out
 *   GET  /health   liveness
 *
 * The error middleware at the bottom is the global handler: anything the relay
 * did not turn into a response becomes one UNHANDLED_ERROR notification and a
 * generic 500. Bodies express cannot parse are answered 400 without notifying.
 */

import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import type { NotificationService } from "../services/interfaces";
import type { WebhookRelayService } from "../services/webhook-relay.service";
import type { Logger } from "../utils/logger.util";
import { describeError } from "../utils/sanitize-error.util";

export interface WebhookAppDeps {
  relay: Pick<WebhookRelayService, "handleAlert">;
  notifier: NotificationService;
  logger: Logger;
  /** Values scrubbed from error text sent to chat */
  secrets: readonly string[];
}

type BodyParserError = Error & { status: number; type: string };

/**
 * Errors raised by express.json() carry the client status and a type tag.
 */
function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500 &&
    "type" in err &&
    typeof err.type === "string"
  );
}

export function createWebhookApp(deps: WebhookAppDeps): express.Express {
  const { relay, notifier, logger, secrets } = deps;
  const app = express();
  const startedAt = Date.now();

  app.disable("x-powered-by");

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  app.post(
    "/webhook",
    express.json({ limit: "16kb", strict: false }),
    (req: Request, res: Response, next: NextFunction) => {
      relay
        .handleAlert(req.body)
        .then((result) => {
          res.status(result.httpStatus).json(result.body);
        })
        .catch(next);
    },
  );

  const globalErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (isBodyParserError(err)) {
      logger.warn(`[HTTP] Rejected ${req.method} ${req.path}: ${err.type}`);
      res.status(400).json({ status: "error", error: "invalid_payload" });
      return;
    }

    const message = describeError(err, secrets);
    logger.error(
      `[HTTP] Unhandled error on ${req.method} ${req.path}: ${message}`,
      err instanceof Error ? err : undefined,
    );
    notifier.notify({ type: "UNHANDLED_ERROR", message });
    res.status(500).json({ status: "error", error: "internal_error" });
  };

  app.use(globalErrorHandler);

  return app;
}
