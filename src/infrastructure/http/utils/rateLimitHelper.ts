/**
 * Helper para criar rate limiters seguros com trust proxy
 */

import { createHash } from "crypto";
import { Request } from "express";
import rateLimit from "express-rate-limit";

interface RateLimitOptions {
  windowMs: number;
  max: number;
  message?: string;
  skip?: (req: Request) => boolean;
}

/**
 * Cria um rate limiter com chave IP + path, para que um cliente atrás do
 * mesmo proxy não consuma o limite das outras rotas.
 */
export function createSecureRateLimiter(options: RateLimitOptions) {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    message: { error: options.message ?? "Too many requests, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request): string => {
      const ip = req.ip || req.socket.remoteAddress || "unknown";
      const path = req.path || req.url?.split("?")[0] || "unknown";
      const digest = createHash("sha256").update(`${ip}:${path}`).digest("hex").slice(0, 16);
      return `rate_limit:${digest}`;
    },
    skip: options.skip,
  });
}
