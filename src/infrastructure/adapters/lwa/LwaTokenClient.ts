/**
 * Cliente HTTP do endpoint de token da Login with Amazon (LWA)
 *
 * @security client_secret enviado apenas no corpo form-encoded, nunca logado
 * @performance Uma única tentativa por troca, com timeout limitado
 */

import axios, { AxiosInstance, isAxiosError } from "axios";
import { z } from "zod";
import { Env } from "../../../config/env";
import { UpstreamError } from "../../../domain/errors/AppError";
import { AuthorizationCodeGrant, LwaTokenPort } from "../../../ports/LwaTokenPort";
import { logger } from "../../logger";
import { tokenExchangesTotal } from "../../metrics/oauthMetrics";

// Cada grant exige só o próprio token; campos acessórios com tipo inesperado
// viram undefined em vez de derrubar uma resposta válida
const refreshTokenGrantSchema = z
  .object({
    refresh_token: z.string().min(1),
    access_token: z.string().optional().catch(undefined),
    expires_in: z.number().optional().catch(undefined),
  })
  .passthrough();

const accessTokenGrantSchema = z
  .object({
    access_token: z.string().min(1),
  })
  .passthrough();

export interface LwaTokenClientOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  http?: Pick<AxiosInstance, "post">;
}

type GrantType = "authorization_code" | "refresh_token";

export class LwaTokenClient implements LwaTokenPort {
  private readonly http: Pick<AxiosInstance, "post">;

  constructor(private readonly options: LwaTokenClientOptions) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs,
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
      });
  }

  static fromConfig(config: Env): LwaTokenClient {
    return new LwaTokenClient({
      tokenUrl: config.LWA_TOKEN_URL,
      clientId: config.LWA_APP_ID,
      clientSecret: config.LWA_CLIENT_SECRET,
      timeoutMs: config.TOKEN_EXCHANGE_TIMEOUT_MS,
    });
  }

  async exchangeAuthorizationCode(code: string, redirectUri: string): Promise<AuthorizationCodeGrant> {
    const raw = await this.requestToken(
      "authorization_code",
      { code, redirect_uri: redirectUri },
      "Failed to exchange authorization code"
    );
    const parsed = refreshTokenGrantSchema.safeParse(raw);

    // 200 sem refresh_token é falha explícita, nunca um valor vazio gravado no banco
    if (!parsed.success) {
      tokenExchangesTotal.inc({ grant_type: "authorization_code", outcome: "missing_token" });
      throw new UpstreamError({
        message: "Token response did not include a refresh_token",
        details: raw,
        upstreamStatus: 200,
      });
    }

    tokenExchangesTotal.inc({ grant_type: "authorization_code", outcome: "success" });
    return {
      refreshToken: parsed.data.refresh_token,
      accessToken: parsed.data.access_token,
      expiresIn: parsed.data.expires_in,
    };
  }

  async refreshAccessToken(refreshToken: string): Promise<string> {
    const raw = await this.requestToken(
      "refresh_token",
      { refresh_token: refreshToken },
      "Failed to refresh access token"
    );
    const parsed = accessTokenGrantSchema.safeParse(raw);

    if (!parsed.success) {
      tokenExchangesTotal.inc({ grant_type: "refresh_token", outcome: "missing_token" });
      throw new UpstreamError({
        message: "Failed to refresh access token",
        details: raw,
        upstreamStatus: 200,
      });
    }

    tokenExchangesTotal.inc({ grant_type: "refresh_token", outcome: "success" });
    return parsed.data.access_token;
  }

  private async requestToken(
    grantType: GrantType,
    params: Record<string, string>,
    failureMessage: string
  ): Promise<unknown> {
    const body = new URLSearchParams({
      grant_type: grantType,
      ...params,
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });

    try {
      const response = await this.http.post<unknown>(this.options.tokenUrl, body.toString(), {
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        timeout: this.options.timeoutMs,
        // Somente 200 conta como sucesso
        validateStatus: (status) => status === 200,
      });
      return response.data;
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        tokenExchangesTotal.inc({ grant_type: grantType, outcome: "rejected" });
        logger.error({
          type: "LWA_TOKEN_REJECTED",
          message: failureMessage,
          payload: { grantType, status: error.response.status, details: error.response.data },
        });
        throw new UpstreamError({
          message: failureMessage,
          details: error.response.data,
          upstreamStatus: error.response.status,
        });
      }

      const message = error instanceof Error ? error.message : String(error);
      tokenExchangesTotal.inc({ grant_type: grantType, outcome: "transport_error" });
      logger.error({
        type: "LWA_TOKEN_TRANSPORT_ERROR",
        message: failureMessage,
        payload: { grantType, error: message, code: isAxiosError(error) ? error.code : undefined },
      });
      throw new UpstreamError({ message: failureMessage, details: { message } });
    }
  }
}
