import { SellerCredential } from "../../domain/entities/SellerCredential";

export interface SellerCredentialRepository {
  findByPartnerId(partnerId: string): Promise<SellerCredential | null>;
  /**
   * Insere ou atualiza o refresh token do seller. Deve ser atômico por
   * `partnerId`: chamadas concorrentes nunca geram duas linhas.
   */
  upsertRefreshToken(partnerId: string, refreshToken: string): Promise<SellerCredential>;
}
