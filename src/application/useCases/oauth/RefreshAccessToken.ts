import { ValidationError } from "../../../domain/errors/AppError";
import { LwaTokenPort } from "../../../ports/LwaTokenPort";
import { SellerCredentialRepository } from "../../../ports/repositories/SellerCredentialRepository";

/**
 * Troca um refresh token por um access token. Não altera o registro do seller.
 * Sem rota HTTP: usado por scripts e integrações internas.
 */
export class RefreshAccessToken {
  constructor(
    private readonly tokens: LwaTokenPort,
    private readonly repository: SellerCredentialRepository
  ) {}

  async execute(refreshToken: string): Promise<string> {
    return this.tokens.refreshAccessToken(refreshToken);
  }

  async forPartner(partnerId: string): Promise<string> {
    const credential = await this.repository.findByPartnerId(partnerId);
    if (!credential) {
      throw new ValidationError(`No credential stored for selling partner ${partnerId}`);
    }
    return this.execute(credential.refreshToken);
  }
}
