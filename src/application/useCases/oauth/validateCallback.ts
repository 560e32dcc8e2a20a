import { timingSafeEqual } from "crypto";
import {
  CallbackMethod,
  CallbackParams,
  ValidatedCallback,
} from "../../../domain/oauth/AuthorizationAttempt";
import { ValidationError } from "../../../domain/errors/AppError";
import { PendingState, isPendingStateExpired } from "../../../domain/oauth/PendingState";

// Nomes dos campos como chegam em cada formato de callback
const WIRE_FIELDS: Record<CallbackMethod, Record<keyof CallbackParams, string>> = {
  GET: { code: "spapi_oauth_code", state: "state", partnerId: "selling_partner_id" },
  POST: { code: "code", state: "state", partnerId: "selling_partner_id" },
};

export type CallbackValidation =
  | { ok: true; value: ValidatedCallback }
  | { ok: false; rejection: "REJECTED_STATE_MISMATCH" | "REJECTED_MISSING_FIELDS"; error: ValidationError };

const isPresent = (value: unknown): value is string => typeof value === "string" && value.length > 0;

/**
 * Igualdade exata byte a byte. Nada de prefixo ou case-insensitive.
 */
export const statesMatch = (supplied: unknown, expected: string): boolean => {
  if (typeof supplied !== "string") return false;
  const a = Buffer.from(supplied, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Ordem fixa: state primeiro, depois campos obrigatórios. Um request sem
 * campos e com state errado é sempre erro de state.
 */
export const validateCallback = (
  method: CallbackMethod,
  params: CallbackParams,
  pending: PendingState | null,
  options: { stateTtlMs: number; now: number }
): CallbackValidation => {
  const stateIsValid =
    pending !== null &&
    !isPendingStateExpired(pending, options.stateTtlMs, options.now) &&
    statesMatch(params.state, pending.value);

  if (!stateIsValid) {
    return {
      ok: false,
      rejection: "REJECTED_STATE_MISMATCH",
      error: new ValidationError(`Invalid state parameter in ${method} request`),
    };
  }

  const { code, state, partnerId } = params;
  if (!isPresent(code) || !isPresent(state) || !isPresent(partnerId)) {
    const fields = WIRE_FIELDS[method];
    const missing = [
      isPresent(code) ? null : fields.code,
      isPresent(state) ? null : fields.state,
      isPresent(partnerId) ? null : fields.partnerId,
    ].filter((field): field is string => field !== null);

    return {
      ok: false,
      rejection: "REJECTED_MISSING_FIELDS",
      error: new ValidationError(`Missing required parameters in ${method} request`, { missing }),
    };
  }

  return { ok: true, value: { code, state, partnerId } };
};
