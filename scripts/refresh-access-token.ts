/**
 * Gera um access token SP-API a partir do refresh token gravado para um seller
 *
 * Uso: npx tsx scripts/refresh-access-token.ts <selling_partner_id>
 *
 * O registro do seller não é alterado.
 */

import "dotenv/config";
import { RefreshAccessToken } from "../src/application/useCases/oauth/RefreshAccessToken";
import { loadConfig } from "../src/config/env";
import { UpstreamError } from "../src/domain/errors/AppError";
import { LwaTokenClient } from "../src/infrastructure/adapters/lwa/LwaTokenClient";
import { closePgPool, getPgPool } from "../src/infrastructure/database/pgPool";
import { PgSellerCredentialRepository } from "../src/infrastructure/database/repositories/PgSellerCredentialRepository";
import { createSecretCipher } from "../src/infrastructure/security/crypto";

async function main() {
  const partnerId = process.argv[2];
  if (!partnerId) {
    throw new Error("Informe o selling_partner_id: npx tsx scripts/refresh-access-token.ts <selling_partner_id>");
  }

  const config = loadConfig();
  const repository = new PgSellerCredentialRepository(
    getPgPool(config.DATABASE_URL),
    config.CREDENTIALS_ENC_KEY ? createSecretCipher(config.CREDENTIALS_ENC_KEY) : undefined
  );
  const refresh = new RefreshAccessToken(LwaTokenClient.fromConfig(config), repository);

  try {
    const accessToken = await refresh.forPartner(partnerId);
    console.log(accessToken);
  } finally {
    await closePgPool();
  }
}

main().catch((error) => {
  if (error instanceof UpstreamError) {
    console.error(`💥 ${error.message}:`, JSON.stringify(error.details));
  } else {
    console.error("💥 Falha ao gerar access token:", error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
