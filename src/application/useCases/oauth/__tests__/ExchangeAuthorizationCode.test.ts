import { InternalError, UpstreamError } from "../../../../domain/errors/AppError";
import { InMemorySellerCredentialRepository } from "../../../../infrastructure/adapters/repositories/InMemorySellerCredentialRepository";
import { FakeLwaTokenClient } from "../../../../__tests__/support/fakes";
import { ExchangeAuthorizationCode } from "../ExchangeAuthorizationCode";

const REDIRECT_URI = "https://broker.example.com/callback";

describe("ExchangeAuthorizationCode", () => {
  let tokens: FakeLwaTokenClient;
  let repository: InMemorySellerCredentialRepository;
  let clock: Date[];

  beforeEach(() => {
    tokens = new FakeLwaTokenClient();
    clock = [new Date("2024-01-01T00:00:00.000Z"), new Date("2024-02-01T00:00:00.000Z")];
    repository = new InMemorySellerCredentialRepository(() => clock.shift() ?? new Date());
  });

  it("sends the configured redirect uri with the code", async () => {
    tokens.exchangeAuthorizationCode.mockResolvedValueOnce({ refreshToken: "RT1" });
    const useCase = new ExchangeAuthorizationCode(tokens, repository, REDIRECT_URI);

    await useCase.execute({ code: "abc", partnerId: "P1" });

    expect(tokens.exchangeAuthorizationCode).toHaveBeenCalledTimes(1);
    expect(tokens.exchangeAuthorizationCode).toHaveBeenCalledWith("abc", REDIRECT_URI);
  });

  it("keeps one record per partner and overwrites only the refresh token", async () => {
    tokens.exchangeAuthorizationCode
      .mockResolvedValueOnce({ refreshToken: "RT1" })
      .mockResolvedValueOnce({ refreshToken: "RT2" });
    const useCase = new ExchangeAuthorizationCode(tokens, repository, REDIRECT_URI);

    const first = await useCase.execute({ code: "code-1", partnerId: "P1" });
    const second = await useCase.execute({ code: "code-2", partnerId: "P1" });

    expect(await repository.count()).toBe(1);
    expect(second.id).toBe(first.id);
    expect(second.refreshToken).toBe("RT2");
    expect(second.createdAt).toEqual(new Date("2024-01-01T00:00:00.000Z"));
  });

  it("serializes concurrent exchanges for the same partner", async () => {
    tokens.exchangeAuthorizationCode
      .mockResolvedValueOnce({ refreshToken: "RT1" })
      .mockResolvedValueOnce({ refreshToken: "RT2" });
    const useCase = new ExchangeAuthorizationCode(tokens, repository, REDIRECT_URI);

    await Promise.all([
      useCase.execute({ code: "code-1", partnerId: "P1" }),
      useCase.execute({ code: "code-2", partnerId: "P1" }),
    ]);

    expect(await repository.count()).toBe(1);
    const stored = await repository.findByPartnerId("P1");
    expect(stored?.refreshToken).toBe("RT2");
  });

  it("stores nothing when the provider rejects the code", async () => {
    tokens.exchangeAuthorizationCode.mockRejectedValueOnce(
      new UpstreamError({ message: "Failed to exchange authorization code", details: { error: "invalid_grant" } })
    );
    const useCase = new ExchangeAuthorizationCode(tokens, repository, REDIRECT_URI);

    await expect(useCase.execute({ code: "abc", partnerId: "P1" })).rejects.toThrow(
      "Failed to exchange authorization code"
    );
    expect(await repository.findByPartnerId("P1")).toBeNull();
  });

  it("propagates store failures", async () => {
    tokens.exchangeAuthorizationCode.mockResolvedValueOnce({ refreshToken: "RT1" });
    jest.spyOn(repository, "upsertRefreshToken").mockRejectedValueOnce(new InternalError("db down"));
    const useCase = new ExchangeAuthorizationCode(tokens, repository, REDIRECT_URI);

    await expect(useCase.execute({ code: "abc", partnerId: "P1" })).rejects.toThrow("db down");
  });
});
