import fs from "fs/promises";
import path from "path";
import { Pool } from "pg";
import { logger } from "../logger";

const SQL_DIR = path.join(process.cwd(), "sql");

/**
 * Aplica os arquivos de `sql/` em ordem alfabética. Os scripts usam
 * `IF NOT EXISTS`, então rodar a cada boot é seguro.
 */
export const applySchema = async (pool: Pick<Pool, "query">, sqlDir: string = SQL_DIR): Promise<string[]> => {
  const files = (await fs.readdir(sqlDir)).filter((file) => file.endsWith(".sql")).sort();

  for (const file of files) {
    const sql = await fs.readFile(path.join(sqlDir, file), "utf8");
    await pool.query(sql);
    logger.debug({ type: "SCHEMA_APPLIED", message: "Schema aplicado", payload: { file } });
  }

  return files;
};
