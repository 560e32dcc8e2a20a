/**
 * Registro compartilhado entre requests dos nonces já usados numa troca.
 * `claim` precisa ser síncrono: o check-and-set acontece antes do primeiro
 * `await` do callback, então duas requisições com o mesmo nonce nunca passam.
 */
export interface StateClaimPort {
  claim(state: string, expiresAt: number, now: number): boolean;
}
