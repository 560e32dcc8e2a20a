// 🔐 SECURITY: Config validada antes de qualquer conexão; processo não sobe sem credenciais LWA
// 🛠️ MAINTAINABILITY: Bootstrap só monta adaptadores de produção, a composição fica em app.ts
// 🧪 TESTABILITY: Nada aqui é importado pelos testes

import chalk from "chalk";
import "dotenv/config";
import { collectDefaultMetrics } from "prom-client";
import { buildApp } from "./app";
import { loadConfig } from "./config/env";
import { ConfigError } from "./domain/errors/AppError";
import { LwaTokenClient } from "./infrastructure/adapters/lwa/LwaTokenClient";
import { closePgPool, getPgPool } from "./infrastructure/database/pgPool";
import { PgSellerCredentialRepository } from "./infrastructure/database/repositories/PgSellerCredentialRepository";
import { applySchema } from "./infrastructure/database/schema";
import makeLogger from "./infrastructure/logger/logger";
import { createSecretCipher } from "./infrastructure/security/crypto";

const logger = makeLogger();

const bootstrap = async () => {
  const config = loadConfig();

  const pool = getPgPool(config.DATABASE_URL);
  const appliedFiles = await applySchema(pool);
  logger.info({
    type: "SCHEMA_READY",
    message: "Schema do banco verificado",
    payload: { files: appliedFiles },
  });

  if (!config.CREDENTIALS_ENC_KEY) {
    logger.warn({
      type: "CREDENTIALS_PLAINTEXT",
      message: "CREDENTIALS_ENC_KEY não configurada, refresh tokens serão gravados sem criptografia",
    });
  }

  collectDefaultMetrics();

  const app = buildApp({
    config,
    sellerRepository: new PgSellerCredentialRepository(
      pool,
      config.CREDENTIALS_ENC_KEY ? createSecretCipher(config.CREDENTIALS_ENC_KEY) : undefined
    ),
    tokenClient: LwaTokenClient.fromConfig(config),
  });

  const server = app.listen(config.PORT, "0.0.0.0", () => {
    console.log("\n" + chalk.cyan("═".repeat(60)));
    console.log(chalk.bold.blue("  [SP-API OAUTH BROKER]"));
    console.log(chalk.cyan("═".repeat(60)));
    console.log(chalk.green(`  [OK] Servidor:       http://localhost:${config.PORT}`));
    console.log(chalk.green(`  [OK] Health Check:   http://localhost:${config.PORT}/healthz`));
    console.log(chalk.yellow(`  [INFO] Ambiente:      ${config.NODE_ENV}`));
    console.log(chalk.yellow(`  [INFO] CORS Origin:   ${config.CORS_ORIGIN}`));
    console.log(chalk.cyan("═".repeat(60)));
    console.log(chalk.magenta("  [ENDPOINTS] Disponíveis:"));
    console.log(chalk.white("     • GET  /start-oauth - Iniciar autorização do seller"));
    console.log(chalk.white("     • GET  /callback    - Conferir retorno do Seller Central"));
    console.log(chalk.white("     • POST /callback    - Trocar code pelo refresh token"));
    console.log(chalk.white("     • POST /webhook     - Receber webhooks"));
    console.log(chalk.cyan("═".repeat(60)) + "\n");

    logger.info({
      type: "SERVER_STARTED",
      message: "SP-API OAuth broker iniciado",
      payload: { port: config.PORT },
    });
  });

  server.on("error", (err: NodeJS.ErrnoException) => {
    logger.error({
      type: err.code === "EADDRINUSE" ? "SERVER_PORT_IN_USE" : "SERVER_START_ERROR",
      message: "Erro ao iniciar servidor",
      error: err,
      payload: { port: config.PORT },
    });
    console.error(chalk.red(`\n❌ Erro ao iniciar servidor: ${err.message}\n`));
    process.exit(1);
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({
      type: "SERVER_SHUTDOWN_REQUESTED",
      message: "Encerrando servidor por sinal recebido",
      payload: { signal },
    });
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await closePgPool();
    logger.info({ type: "SERVER_SHUTDOWN_COMPLETE", message: "Servidor encerrado" });
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ type: "SERVER_SHUTDOWN_FAILED", message: "Falha ao encerrar servidor", error: err });
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
};

bootstrap().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error({
      type: "CONFIG_INVALID",
      message: "Variáveis de ambiente inválidas",
      payload: { issues: err.issues },
    });
    console.error(chalk.red("❌ Invalid environment variables:"));
    err.issues.forEach((issue) => console.error(chalk.red(`   • ${issue}`)));
  } else {
    logger.error({ type: "SERVER_BOOTSTRAP_FAILED", message: "Bootstrap falhou", error: err });
    console.error(chalk.red(`\n❌ Erro fatal: ${err instanceof Error ? err.message : "Erro desconhecido"}\n`));
  }
  process.exit(1);
});
