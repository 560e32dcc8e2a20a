import { SellerCredential } from '../../../domain/entities/SellerCredential';
import { SellerCredentialRepository } from '../../../ports/repositories/SellerCredentialRepository';

export class InMemorySellerCredentialRepository
  implements SellerCredentialRepository
{
  private sellers = new Map<string, SellerCredential>();
  private locks = new Map<string, Promise<unknown>>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findByPartnerId(
    partnerId: string
  ): Promise<SellerCredential | null> {
    const found = this.sellers.get(partnerId);
    return found ? { ...found } : null;
  }

  async upsertRefreshToken(
    partnerId: string,
    refreshToken: string
  ): Promise<SellerCredential> {
    return this.withLock(partnerId, async () => {
      const existing = this.sellers.get(partnerId);
      const entity: SellerCredential = existing
        ? { ...existing, refreshToken }
        : {
            id: this.nextId++,
            partnerId,
            refreshToken,
            createdAt: this.now(),
          };
      this.sellers.set(partnerId, entity);
      return { ...entity };
    });
  }

  async count(): Promise<number> {
    return this.sellers.size;
  }

  // Serializa leitura+escrita por partnerId, na ordem de chegada
  private async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const current = previous.then(task, task);
    const settled = current.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, settled);
    try {
      return await current;
    } finally {
      if (this.locks.get(key) === settled) {
        this.locks.delete(key);
      }
    }
  }
}
