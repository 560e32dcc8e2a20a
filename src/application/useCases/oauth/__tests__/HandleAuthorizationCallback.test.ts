import { UpstreamError, ValidationError } from "../../../../domain/errors/AppError";
import { InMemorySellerCredentialRepository } from "../../../../infrastructure/adapters/repositories/InMemorySellerCredentialRepository";
import { FakeLwaTokenClient, MemorySession } from "../../../../__tests__/support/fakes";
import { ExchangeAuthorizationCode } from "../ExchangeAuthorizationCode";
import { HandleAuthorizationCallback } from "../HandleAuthorizationCallback";
import { AuthorizationCodeGrant } from "../../../../ports/LwaTokenPort";

const REDIRECT_URI = "https://broker.example.com/callback";

describe("HandleAuthorizationCallback", () => {
  let tokens: FakeLwaTokenClient;
  let repository: InMemorySellerCredentialRepository;
  let session: MemorySession;
  let useCase: HandleAuthorizationCallback;

  beforeEach(() => {
    tokens = new FakeLwaTokenClient();
    repository = new InMemorySellerCredentialRepository();
    session = new MemorySession();
    session.bindPendingState({ value: "X", issuedAt: 0 });
    useCase = new HandleAuthorizationCallback(
      new ExchangeAuthorizationCode(tokens, repository, REDIRECT_URI),
      { stateTtlMs: 60_000, now: () => 1_000 }
    );
  });

  describe("GET (read-only check)", () => {
    it("returns the authorization code without exchanging it", async () => {
      const outcome = await useCase.execute("GET", { code: "abc", state: "X", partnerId: "P1" }, session);

      expect(outcome).toEqual({ kind: "CODE_CONFIRMED", authCode: "abc" });
      expect(tokens.exchangeAuthorizationCode).not.toHaveBeenCalled();
      expect(await repository.count()).toBe(0);
    });

    it("keeps the nonce bound so the exchange can follow", async () => {
      await useCase.execute("GET", { code: "abc", state: "X", partnerId: "P1" }, session);

      expect(session.pending).toEqual({ value: "X", issuedAt: 0 });
    });
  });

  describe("POST (exchange trigger)", () => {
    it("exchanges the code and stores the refresh token", async () => {
      tokens.exchangeAuthorizationCode.mockResolvedValueOnce({ refreshToken: "RT1" });

      const outcome = await useCase.execute("POST", { code: "abc", state: "X", partnerId: "P1" }, session);

      expect(outcome).toEqual({ kind: "CREDENTIAL_STORED", partnerId: "P1" });
      expect(tokens.exchangeAuthorizationCode).toHaveBeenCalledWith("abc", REDIRECT_URI);
      const stored = await repository.findByPartnerId("P1");
      expect(stored?.refreshToken).toBe("RT1");
    });

    it("consumes the nonce once validation passes", async () => {
      tokens.exchangeAuthorizationCode.mockResolvedValueOnce({ refreshToken: "RT1" });

      await useCase.execute("POST", { code: "abc", state: "X", partnerId: "P1" }, session);

      expect(session.pending).toBeNull();
      await expect(
        useCase.execute("POST", { code: "abc", state: "X", partnerId: "P1" }, session)
      ).rejects.toThrow("Invalid state parameter in POST request");
    });

    it("lets only one of two concurrent callbacks with the same nonce exchange", async () => {
      tokens.exchangeAuthorizationCode.mockImplementation(
        () => new Promise<AuthorizationCodeGrant>((resolve) => setTimeout(() => resolve({ refreshToken: "RT1" }), 20))
      );
      // Duas cópias da mesma sessão, como o store entrega a requests simultâneos
      const twin = new MemorySession();
      twin.bindPendingState({ value: "X", issuedAt: 0 });
      const params = { code: "abc", state: "X", partnerId: "P1" };

      const results = await Promise.allSettled([
        useCase.execute("POST", params, session),
        useCase.execute("POST", params, twin),
      ]);

      expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
      const rejected = results[1];
      expect(rejected.status === "rejected" && rejected.reason).toBeInstanceOf(ValidationError);
      expect(tokens.exchangeAuthorizationCode).toHaveBeenCalledTimes(1);
    });

    it("rejects a mismatched state without touching session, provider or store", async () => {
      const result = useCase.execute("POST", { code: "abc", state: "Y", partnerId: "P1" }, session);

      await expect(result).rejects.toBeInstanceOf(ValidationError);
      expect(session.pending).toEqual({ value: "X", issuedAt: 0 });
      expect(tokens.exchangeAuthorizationCode).not.toHaveBeenCalled();
      expect(await repository.count()).toBe(0);
    });

    it("rejects missing fields after a matching state", async () => {
      await expect(
        useCase.execute("POST", { code: "abc", state: "X", partnerId: undefined }, session)
      ).rejects.toThrow("Missing required parameters in POST request");
      expect(tokens.exchangeAuthorizationCode).not.toHaveBeenCalled();
    });

    it("propagates provider failures and writes nothing", async () => {
      tokens.exchangeAuthorizationCode.mockRejectedValueOnce(
        new UpstreamError({
          message: "Failed to exchange authorization code",
          details: { error: "invalid_grant" },
          upstreamStatus: 400,
        })
      );

      await expect(
        useCase.execute("POST", { code: "abc", state: "X", partnerId: "P1" }, session)
      ).rejects.toBeInstanceOf(UpstreamError);
      expect(await repository.count()).toBe(0);
    });
  });
});
