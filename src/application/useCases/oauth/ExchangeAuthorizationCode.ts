import { SellerCredential } from "../../../domain/entities/SellerCredential";
import { AuthorizationAttemptState } from "../../../domain/oauth/AuthorizationAttempt";
import { logger } from "../../../infrastructure/logger";
import { LwaTokenPort } from "../../../ports/LwaTokenPort";
import { SellerCredentialRepository } from "../../../ports/repositories/SellerCredentialRepository";

interface ExchangeAuthorizationCodeInput {
  code: string;
  partnerId: string;
}

export class ExchangeAuthorizationCode {
  constructor(
    private readonly tokens: LwaTokenPort,
    private readonly repository: SellerCredentialRepository,
    private readonly redirectUri: string
  ) {}

  async execute(input: ExchangeAuthorizationCodeInput): Promise<SellerCredential> {
    let refreshToken: string;
    try {
      const grant = await this.tokens.exchangeAuthorizationCode(input.code, this.redirectUri);
      refreshToken = grant.refreshToken;
    } catch (error) {
      const attempt: AuthorizationAttemptState = "EXCHANGE_FAILED";
      logger.warn({
        type: "OAUTH_EXCHANGE_FAILED",
        message: "Troca do authorization code falhou",
        payload: { attempt, partnerId: input.partnerId },
        error,
      });
      throw error;
    }

    // Nada é gravado se a troca falhar
    const credential = await this.repository.upsertRefreshToken(input.partnerId, refreshToken);

    const attempt: AuthorizationAttemptState = "CREDENTIAL_STORED";
    logger.info({
      type: "OAUTH_CREDENTIAL_STORED",
      message: "Refresh token do seller gravado",
      payload: { attempt, partnerId: credential.partnerId, sellerId: credential.id },
    });

    return credential;
  }
}
