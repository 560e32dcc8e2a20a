/**
 * Aplica os arquivos de sql/ no banco apontado por DATABASE_URL
 *
 * Uso: npx tsx scripts/apply-schema.ts
 */

import "dotenv/config";
import { closePgPool, getPgPool } from "../src/infrastructure/database/pgPool";
import { applySchema } from "../src/infrastructure/database/schema";

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL não está definida. Configure no .env antes de rodar o script.");
  }

  const maskedUrl = databaseUrl.replace(/:[^:@/]+@/, ":***@");
  console.log(`🔌 Conectando ao banco: ${maskedUrl}`);

  try {
    const files = await applySchema(getPgPool(databaseUrl));
    files.forEach((file) => console.log(`   ✓ ${file}`));
    console.log("\n✅ Schema aplicado com sucesso!");
  } finally {
    await closePgPool();
  }
}

main().catch((error) => {
  console.error("💥 Falha ao aplicar schema:", error);
  process.exit(1);
});
