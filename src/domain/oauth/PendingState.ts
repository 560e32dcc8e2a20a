/**
 * Nonce de autorização pendente, vinculado à sessão de quem iniciou o fluxo.
 */
export interface PendingState {
  value: string;
  issuedAt: number;
}

export const isPendingStateExpired = (state: PendingState, ttlMs: number, now: number): boolean =>
  now - state.issuedAt > ttlMs;
