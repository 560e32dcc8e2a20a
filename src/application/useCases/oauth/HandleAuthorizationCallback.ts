import {
  AuthorizationAttemptState,
  CallbackMethod,
  CallbackOutcome,
  CallbackParams,
} from "../../../domain/oauth/AuthorizationAttempt";
import { logger } from "../../../infrastructure/logger";
import { callbacksTotal } from "../../../infrastructure/metrics/oauthMetrics";
import { ValidationError } from "../../../domain/errors/AppError";
import { InMemoryStateClaimStore } from "../../../infrastructure/adapters/oauth/InMemoryStateClaimStore";
import { PendingStateSessionPort } from "../../../ports/PendingStateSessionPort";
import { StateClaimPort } from "../../../ports/StateClaimPort";
import { ExchangeAuthorizationCode } from "./ExchangeAuthorizationCode";
import { validateCallback } from "./validateCallback";

export interface HandleAuthorizationCallbackOptions {
  stateTtlMs: number;
  now?: () => number;
  claims?: StateClaimPort;
}

/**
 * GET: só confere state e campos e devolve o code (o front-end confirma o
 * recebimento). POST: mesma validação, consome o nonce e dispara a troca.
 */
export class HandleAuthorizationCallback {
  private readonly now: () => number;
  private readonly claims: StateClaimPort;

  constructor(
    private readonly exchange: ExchangeAuthorizationCode,
    private readonly options: HandleAuthorizationCallbackOptions
  ) {
    this.now = options.now ?? (() => Date.now());
    this.claims = options.claims ?? new InMemoryStateClaimStore();
  }

  async execute(
    method: CallbackMethod,
    params: CallbackParams,
    session: PendingStateSessionPort
  ): Promise<CallbackOutcome> {
    const received: AuthorizationAttemptState = "CALLBACK_RECEIVED";
    logger.debug({
      type: "OAUTH_CALLBACK_RECEIVED",
      message: `Callback ${method} recebido`,
      payload: {
        attempt: received,
        partnerId: params.partnerId,
        state: params.state,
        hasCode: typeof params.code === "string" && params.code.length > 0,
      },
    });

    const pending = session.readPendingState();
    const now = this.now();
    const validation = validateCallback(method, params, pending, {
      stateTtlMs: this.options.stateTtlMs,
      now,
    });

    if (!validation.ok) {
      callbacksTotal.inc({ method, outcome: validation.rejection.toLowerCase() });
      logger.warn({
        type: "OAUTH_CALLBACK_REJECTED",
        message: validation.error.message,
        payload: { attempt: validation.rejection, missing: validation.error.missing },
      });
      throw validation.error;
    }

    const { code, partnerId } = validation.value;

    if (method === "GET") {
      callbacksTotal.inc({ method, outcome: "code_confirmed" });
      return { kind: "CODE_CONFIRMED", authCode: code };
    }

    // Uso único: o nonce não vale para uma segunda troca
    session.clearPendingState();

    // A sessão só volta ao store no fim da resposta; requests concorrentes
    // com o mesmo cookie ainda veem o nonce, então o claim decide quem troca
    const expiresAt = (pending?.issuedAt ?? now) + this.options.stateTtlMs;
    if (!this.claims.claim(validation.value.state, expiresAt, now)) {
      callbacksTotal.inc({ method, outcome: "rejected_state_reused" });
      logger.warn({
        type: "OAUTH_CALLBACK_REJECTED",
        message: "State já consumido por outra requisição",
        payload: { attempt: "REJECTED_STATE_MISMATCH", partnerId },
      });
      throw new ValidationError(`Invalid state parameter in ${method} request`);
    }

    try {
      const credential = await this.exchange.execute({ code, partnerId });
      callbacksTotal.inc({ method, outcome: "credential_stored" });
      return { kind: "CREDENTIAL_STORED", partnerId: credential.partnerId };
    } catch (error) {
      callbacksTotal.inc({ method, outcome: "exchange_failed" });
      throw error;
    }
  }
}
