import { Pool } from "pg";
import { logger } from "../logger";

let pool: Pool | null = null;

export const getPgPool = (databaseUrl: string): Pool => {
  if (!pool) {
    pool = new Pool({ connectionString: databaseUrl, max: 10 });
    pool.on("error", (error) => {
      logger.error({
        type: "PG_POOL_ERROR",
        message: "Erro inesperado em conexão ociosa do pool",
        error,
      });
    });
  }
  return pool;
};

export const closePgPool = async (): Promise<void> => {
  if (pool) {
    await pool.end();
    pool = null;
  }
};
