/**
 * Alert Validator
 *
 * Turns an untrusted webhook payload into an Alert. The secret is checked
 * before anything else so a bad secret is always reported as UNAUTHORIZED,
 * whatever else the payload contains. Symbols are not checked against the
 * exchange's markets; an unknown symbol fails later, at the exchange.
 */

import crypto from "node:crypto";
import * as z from "zod";
import { ALERT_ACTIONS } from "../constants/relay.constants";
import type { Alert } from "../domain/alert.types";

export type ValidationFailureKind =
  | "UNAUTHORIZED"
  | "INVALID_ACTION"
  | "INVALID_PAYLOAD";

export type AlertValidation =
  | { ok: true; alert: Alert }
  | { ok: false; kind: ValidationFailureKind; message: string };

export interface AlertValidatorOptions {
  secret: string;
  defaultSymbol: string;
}

const secretSchema = z.object({ secret: z.string() });

const actionSchema = z.object({
  action: z
    .string()
    .transform((action) => action.toUpperCase())
    .pipe(z.enum(ALERT_ACTIONS)),
});

const symbolSchema = z.object({
  symbol: z.string().trim().nullish(),
});

const digest = (value: string): Buffer =>
  crypto.createHash("sha256").update(value, "utf8").digest();

/**
 * Constant-time string comparison (hashing first equalizes lengths)
 */
export function secretsMatch(provided: string, expected: string): boolean {
  return crypto.timingSafeEqual(digest(provided), digest(expected));
}

export function validateAlert(
  payload: unknown,
  options: AlertValidatorOptions,
): AlertValidation {
  const secretResult = secretSchema.safeParse(payload);
  if (
    !secretResult.success ||
    !secretsMatch(secretResult.data.secret, options.secret)
  ) {
    return { ok: false, kind: "UNAUTHORIZED", message: "Invalid secret" };
  }

  const actionResult = actionSchema.safeParse(payload);
  if (!actionResult.success) {
    return {
      ok: false,
      kind: "INVALID_ACTION",
      message: `Unknown action: ${describeAction(payload)}`,
    };
  }

  const symbolResult = symbolSchema.safeParse(payload);
  if (!symbolResult.success) {
    return {
      ok: false,
      kind: "INVALID_PAYLOAD",
      message: "symbol must be a string",
    };
  }

  return {
    ok: true,
    alert: {
      secret: secretResult.data.secret,
      action: actionResult.data.action,
      symbol: symbolResult.data.symbol || options.defaultSymbol,
    },
  };
}

function describeAction(payload: unknown): string {
  if (typeof payload !== "object" || payload === null || !("action" in payload)) {
    return "<missing>";
  }
  const { action } = payload;
  return typeof action === "string" ? action.slice(0, 32) : typeof action;
}
