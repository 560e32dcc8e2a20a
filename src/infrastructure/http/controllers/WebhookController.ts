import crypto from "crypto";
import { NextFunction, Request, Response } from "express";
import { logger } from "../../logger";

export const WEBHOOK_SIGNATURE_HEADER = "x-webhook-signature";

/**
 * Assinatura = HMAC-SHA256 (hex) do corpo bruto, com o segredo compartilhado.
 */
export const isValidWebhookSignature = (
  rawBody: Buffer,
  signature: string | undefined,
  secret: string
): boolean => {
  if (!signature || !/^[0-9a-f]+$/i.test(signature)) {
    return false;
  }

  const expected = crypto.createHmac("sha256", secret).update(rawBody).digest();
  const received = Buffer.from(signature, "hex");

  return received.length === expected.length && crypto.timingSafeEqual(received, expected);
};

export class WebhookController {
  constructor(private readonly signingSecret?: string) {}

  /**
   * POST /webhook. Sem segredo configurado, aceita qualquer JSON.
   */
  handle(req: Request, res: Response, next: NextFunction): void {
    try {
      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

      if (this.signingSecret) {
        const signature = req.header(WEBHOOK_SIGNATURE_HEADER);
        if (!isValidWebhookSignature(rawBody, signature, this.signingSecret)) {
          logger.warn({
            type: "WEBHOOK_INVALID_SIGNATURE",
            message: "Webhook rejeitado: assinatura inválida",
            payload: { hasSignature: Boolean(signature) },
          });
          res.status(401).json({ error: "Invalid webhook signature" });
          return;
        }
      }

      // JSON inválido sobe para o errorHandler como erro interno
      const payload: unknown = JSON.parse(rawBody.toString("utf8"));

      logger.debug({
        type: "WEBHOOK_RECEIVED",
        message: "Webhook recebido",
        payload: { data: payload },
      });

      res.status(200).json({ message: "Webhook received successfully" });
    } catch (error) {
      next(error);
    }
  }
}
