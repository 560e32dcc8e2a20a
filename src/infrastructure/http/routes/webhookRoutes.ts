import express, { Router } from "express";
import { WebhookController } from "../controllers/WebhookController";

export const createWebhookRouter = (controller: WebhookController): Router => {
  const webhookRouter = Router();

  // Corpo bruto, com ou sem Content-Type: a assinatura é calculada sobre os bytes recebidos
  webhookRouter.post("/", express.raw({ type: () => true, limit: "1mb" }), controller.handle.bind(controller));

  return webhookRouter;
};
