import { Session, SessionData } from "express-session";
import { PendingState } from "../../../domain/oauth/PendingState";
import { PendingStateSessionPort } from "../../../ports/PendingStateSessionPort";

declare module "express-session" {
  interface SessionData {
    oauthState?: PendingState;
  }
}

/**
 * Nonce pendente guardado na sessão do express-session, sob a chave fixa `oauthState`.
 */
export class ExpressPendingStateSession implements PendingStateSessionPort {
  constructor(private readonly session: Session & Partial<SessionData>) {}

  readPendingState(): PendingState | null {
    const pending = this.session.oauthState;
    if (!pending || typeof pending.value !== "string" || typeof pending.issuedAt !== "number") {
      return null;
    }
    return pending;
  }

  bindPendingState(state: PendingState): void {
    this.session.oauthState = state;
  }

  clearPendingState(): void {
    delete this.session.oauthState;
  }
}
