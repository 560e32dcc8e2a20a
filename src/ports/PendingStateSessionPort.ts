import { PendingState } from "../domain/oauth/PendingState";

/**
 * Acesso ao nonce pendente da sessão do chamador. A implementação de produção
 * fica sobre o express-session; nos testes unitários usa-se um objeto em memória.
 */
export interface PendingStateSessionPort {
  readPendingState(): PendingState | null;
  bindPendingState(state: PendingState): void;
  clearPendingState(): void;
}
