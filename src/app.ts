/**
 * @security Helmet, CORS com origem única, sessão assinada, rate limit nas rotas OAuth
 * @maintainability App montado a partir de dependências explícitas, sem estado global de request
 * @testability buildApp recebe repositório, cliente LWA e store de sessão injetáveis
 */

import cors from "cors";
import express, { Express, NextFunction, Request, Response } from "express";
import { Store } from "express-session";
import helmet from "helmet";
import pinoHttp from "pino-http";
import { BeginAuthorization } from "./application/useCases/oauth/BeginAuthorization";
import { ExchangeAuthorizationCode } from "./application/useCases/oauth/ExchangeAuthorizationCode";
import { HandleAuthorizationCallback } from "./application/useCases/oauth/HandleAuthorizationCallback";
import { Env } from "./config/env";
import { OAuthController } from "./infrastructure/http/controllers/OAuthController";
import { WebhookController } from "./infrastructure/http/controllers/WebhookController";
import { createErrorHandler } from "./infrastructure/http/middlewares/errorHandler";
import { createSessionMiddleware } from "./infrastructure/http/middlewares/sessionMiddleware";
import { createOAuthRouter } from "./infrastructure/http/routes/oauthRoutes";
import { createWebhookRouter } from "./infrastructure/http/routes/webhookRoutes";
import { createSecureRateLimiter } from "./infrastructure/http/utils/rateLimitHelper";
import { pinoLogger } from "./infrastructure/logger";
import { metricsRegistry } from "./infrastructure/metrics/oauthMetrics";
import { LwaTokenPort } from "./ports/LwaTokenPort";
import { SellerCredentialRepository } from "./ports/repositories/SellerCredentialRepository";
import { StateClaimPort } from "./ports/StateClaimPort";

export interface AppDependencies {
  config: Env;
  sellerRepository: SellerCredentialRepository;
  tokenClient: LwaTokenPort;
  sessionStore?: Store;
  stateClaims?: StateClaimPort;
  generateState?: () => string;
  now?: () => number;
}

export const buildApp = (deps: AppDependencies): Express => {
  const { config } = deps;
  const app = express();

  // Atrás de proxy (Render/NGINX) o cookie Secure depende de X-Forwarded-Proto
  app.set("trust proxy", 1);

  app.use(helmet());
  app.use(
    cors({
      origin: config.CORS_ORIGIN,
      credentials: true,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    })
  );

  app.use(
    pinoHttp({
      logger: pinoLogger,
      autoLogging: {
        ignore: (req) => req.url === "/healthz" || req.url === "/metrics",
      },
      // Query string fica fora do log: carrega code e state
      serializers: {
        req: (req: { id?: unknown; method?: string; url?: string }) => ({
          id: req.id,
          method: req.method,
          url: req.url?.split("?")[0],
        }),
        res: (res: { statusCode?: number }) => ({
          statusCode: res.statusCode,
        }),
      },
      customLogLevel: (_req, res, err) => {
        if (err || res.statusCode >= 500) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
    })
  );

  app.use(
    createSessionMiddleware({
      secret: config.SESSION_SECRET,
      secureCookies: config.SESSION_COOKIE_SECURE,
      store: deps.sessionStore,
    })
  );

  // Antes do express.json(): o webhook precisa do corpo bruto
  app.use("/webhook", createWebhookRouter(new WebhookController(config.WEBHOOK_SIGNING_SECRET)));

  app.use(express.json());

  const beginAuthorization = new BeginAuthorization(
    {
      authorizationUrl: config.SPAPI_AUTHORIZATION_URL,
      applicationId: config.LWA_APP_ID,
      redirectUri: config.REDIRECT_URI,
      version: config.SPAPI_APP_VERSION,
    },
    deps.generateState,
    deps.now
  );
  const handleCallback = new HandleAuthorizationCallback(
    new ExchangeAuthorizationCode(deps.tokenClient, deps.sellerRepository, config.REDIRECT_URI),
    { stateTtlMs: config.OAUTH_STATE_TTL_MINUTES * 60 * 1000, now: deps.now, claims: deps.stateClaims }
  );
  const oauthLimiter = createSecureRateLimiter({ windowMs: 60 * 1000, max: config.RATE_LIMIT_MAX });

  app.use("/", createOAuthRouter(new OAuthController(beginAuthorization, handleCallback), oauthLimiter));

  app.get("/", (_req, res) => {
    res.status(200).send("Welcome to the SP-API OAuth broker! API is running.");
  });

  app.get("/healthz", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.get("/metrics", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.setHeader("Content-Type", metricsRegistry.contentType);
      res.end(await metricsRegistry.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(createErrorHandler({ exposeInternalErrors: config.EXPOSE_INTERNAL_ERRORS }));

  return app;
};
