import { randomUUID } from "crypto";
import { AuthorizationAttemptState, RedirectTarget } from "../../../domain/oauth/AuthorizationAttempt";
import { logger } from "../../../infrastructure/logger";
import { authorizationsStarted } from "../../../infrastructure/metrics/oauthMetrics";
import { PendingStateSessionPort } from "../../../ports/PendingStateSessionPort";

export interface BeginAuthorizationConfig {
  authorizationUrl: string;
  applicationId: string;
  redirectUri: string;
  version: string;
}

/**
 * Emite o nonce da tentativa, grava na sessão (substituindo qualquer nonce
 * anterior) e monta a URL de consentimento do Seller Central.
 */
export class BeginAuthorization {
  constructor(
    private readonly config: BeginAuthorizationConfig,
    private readonly generateState: () => string = () => randomUUID(),
    private readonly now: () => number = () => Date.now()
  ) {}

  execute(session: PendingStateSessionPort): RedirectTarget {
    const state = this.generateState();
    session.bindPendingState({ value: state, issuedAt: this.now() });

    const url = new URL(this.config.authorizationUrl);
    url.searchParams.set("application_id", this.config.applicationId);
    url.searchParams.set("state", state);
    url.searchParams.set("version", this.config.version);
    url.searchParams.set("redirect_uri", this.config.redirectUri);

    authorizationsStarted.inc();
    const attempt: AuthorizationAttemptState = "NONCE_ISSUED";
    logger.info({
      type: "OAUTH_NONCE_ISSUED",
      message: "Nonce emitido, redirecionando para o consentimento",
      payload: { attempt, state },
    });

    return { redirectUrl: url.toString(), state };
  }
}
