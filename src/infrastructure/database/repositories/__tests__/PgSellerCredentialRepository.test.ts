import { createSecretCipher } from "../../../security/crypto";
import { PgSellerCredentialRepository } from "../PgSellerCredentialRepository";

const createdAt = new Date("2024-01-01T00:00:00.000Z");

const row = (refreshToken: string) => ({
  id: 7,
  selling_partner_id: "P1",
  refresh_token: refreshToken,
  created_at: createdAt,
});

describe("PgSellerCredentialRepository", () => {
  let query: jest.Mock;

  beforeEach(() => {
    query = jest.fn();
  });

  it("upserts by selling_partner_id", async () => {
    query.mockResolvedValueOnce({ rows: [row("RT1")] });
    const repository = new PgSellerCredentialRepository({ query });

    const stored = await repository.upsertRefreshToken("P1", "RT1");

    expect(stored).toEqual({ id: 7, partnerId: "P1", refreshToken: "RT1", createdAt });
    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain("INSERT INTO amazon_sellers (selling_partner_id, refresh_token)");
    expect(sql).toContain("ON CONFLICT (selling_partner_id)");
    expect(sql).toContain("DO UPDATE SET refresh_token = EXCLUDED.refresh_token");
    expect(params).toEqual(["P1", "RT1"]);
  });

  it("throws when the upsert returns no row", async () => {
    query.mockResolvedValueOnce({ rows: [] });
    const repository = new PgSellerCredentialRepository({ query });

    await expect(repository.upsertRefreshToken("P1", "RT1")).rejects.toThrow(
      "Upsert returned no row for selling partner P1"
    );
  });

  it("finds a record by partner id", async () => {
    query.mockResolvedValueOnce({ rows: [row("RT1")] });
    const repository = new PgSellerCredentialRepository({ query });

    const found = await repository.findByPartnerId("P1");

    expect(found).toEqual({ id: 7, partnerId: "P1", refreshToken: "RT1", createdAt });
    expect(query.mock.calls[0][1]).toEqual(["P1"]);
  });

  it("returns null when no record exists", async () => {
    query.mockResolvedValueOnce({ rows: [] });
    const repository = new PgSellerCredentialRepository({ query });

    expect(await repository.findByPartnerId("P1")).toBeNull();
  });

  describe("with a cipher", () => {
    const cipher = createSecretCipher("k".repeat(32));

    it("stores the refresh token encrypted and returns it decrypted", async () => {
      query.mockImplementationOnce(async (_sql: string, params: string[]) => ({ rows: [row(params[1])] }));
      const repository = new PgSellerCredentialRepository({ query }, cipher);

      const stored = await repository.upsertRefreshToken("P1", "RT1");

      const written = query.mock.calls[0][1][1];
      expect(written).not.toBe("RT1");
      expect(cipher.decrypt(written)).toBe("RT1");
      expect(stored.refreshToken).toBe("RT1");
    });

    it("reads plaintext rows written before encryption was enabled", async () => {
      query.mockResolvedValueOnce({ rows: [row("RT-legacy")] });
      const repository = new PgSellerCredentialRepository({ query }, cipher);

      const found = await repository.findByPartnerId("P1");

      expect(found?.refreshToken).toBe("RT-legacy");
    });
  });
});
