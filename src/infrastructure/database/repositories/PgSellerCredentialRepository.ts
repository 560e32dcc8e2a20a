import { Pool } from "pg";
import { SellerCredential } from "../../../domain/entities/SellerCredential";
import { SellerCredentialRepository } from "../../../ports/repositories/SellerCredentialRepository";
import { SecretCipher, decryptSafe } from "../../security/crypto";

interface AmazonSellerRow {
  id: number;
  selling_partner_id: string;
  refresh_token: string;
  created_at: Date;
}

const COLUMNS = "id, selling_partner_id, refresh_token, created_at";

// ON CONFLICT garante o upsert atômico por selling_partner_id (constraint UNIQUE)
const UPSERT_SQL = `
  INSERT INTO amazon_sellers (selling_partner_id, refresh_token)
  VALUES ($1, $2)
  ON CONFLICT (selling_partner_id)
  DO UPDATE SET refresh_token = EXCLUDED.refresh_token
  RETURNING ${COLUMNS}
`;

export class PgSellerCredentialRepository implements SellerCredentialRepository {
  constructor(
    private readonly db: Pick<Pool, "query">,
    private readonly cipher?: SecretCipher
  ) {}

  async findByPartnerId(partnerId: string): Promise<SellerCredential | null> {
    const result = await this.db.query<AmazonSellerRow>(
      `SELECT ${COLUMNS} FROM amazon_sellers WHERE selling_partner_id = $1`,
      [partnerId]
    );
    const row = result.rows[0];
    return row ? this.toEntity(row) : null;
  }

  async upsertRefreshToken(partnerId: string, refreshToken: string): Promise<SellerCredential> {
    const stored = this.cipher ? this.cipher.encrypt(refreshToken) : refreshToken;
    const result = await this.db.query<AmazonSellerRow>(UPSERT_SQL, [partnerId, stored]);
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Upsert returned no row for selling partner ${partnerId}`);
    }
    return this.toEntity(row);
  }

  private toEntity(row: AmazonSellerRow): SellerCredential {
    return {
      id: row.id,
      partnerId: row.selling_partner_id,
      refreshToken: this.cipher ? decryptSafe(this.cipher, row.refresh_token) : row.refresh_token,
      createdAt: row.created_at,
    };
  }
}
