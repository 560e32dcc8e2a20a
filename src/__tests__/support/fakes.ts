import { Env, loadConfig } from "../../config/env";
import { PendingState } from "../../domain/oauth/PendingState";
import { AuthorizationCodeGrant, LwaTokenPort } from "../../ports/LwaTokenPort";
import { PendingStateSessionPort } from "../../ports/PendingStateSessionPort";

export class MemorySession implements PendingStateSessionPort {
  pending: PendingState | null = null;

  readPendingState(): PendingState | null {
    return this.pending;
  }

  bindPendingState(state: PendingState): void {
    this.pending = state;
  }

  clearPendingState(): void {
    this.pending = null;
  }
}

export class FakeLwaTokenClient implements LwaTokenPort {
  exchangeAuthorizationCode = jest.fn<Promise<AuthorizationCodeGrant>, [string, string]>();
  refreshAccessToken = jest.fn<Promise<string>, [string]>();
}

export const TEST_REDIRECT_URI = "https://broker.example.com/callback";
export const TEST_AUTHORIZATION_URL = "https://sellercentral.example.com/apps/authorize/consent";
export const TEST_CORS_ORIGIN = "https://frontend.example.com";

export const testConfig = (overrides: Record<string, string> = {}): Env =>
  loadConfig({
    NODE_ENV: "test",
    LWA_APP_ID: "amzn1.sp.solution.test-app",
    LWA_CLIENT_SECRET: "test-secret",
    REDIRECT_URI: TEST_REDIRECT_URI,
    SPAPI_AUTHORIZATION_URL: TEST_AUTHORIZATION_URL,
    DATABASE_URL: "postgresql://localhost:5432/test",
    SESSION_SECRET: "test-session-secret",
    SESSION_COOKIE_SECURE: "false",
    CORS_ORIGIN: TEST_CORS_ORIGIN,
    RATE_LIMIT_MAX: "1000",
    ...overrides,
  });
