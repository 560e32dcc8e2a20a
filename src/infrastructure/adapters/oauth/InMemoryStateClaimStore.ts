import { StateClaimPort } from "../../../ports/StateClaimPort";

/**
 * Guarda cada nonce consumido até ele expirar; depois disso a sessão já o
 * rejeita pelo TTL e a entrada pode sair.
 */
export class InMemoryStateClaimStore implements StateClaimPort {
  private claimed = new Map<string, number>();

  claim(state: string, expiresAt: number, now: number): boolean {
    this.cleanup(now);
    if (this.claimed.has(state)) {
      return false;
    }
    this.claimed.set(state, expiresAt);
    return true;
  }

  size(): number {
    return this.claimed.size;
  }

  private cleanup(now: number): void {
    for (const [state, expiresAt] of this.claimed.entries()) {
      if (now > expiresAt) {
        this.claimed.delete(state);
      }
    }
  }
}
