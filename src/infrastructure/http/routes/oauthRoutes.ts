import { RequestHandler, Router } from "express";
import { OAuthController } from "../controllers/OAuthController";

export const createOAuthRouter = (controller: OAuthController, limiter: RequestHandler): Router => {
  const oauthRouter = Router();

  oauthRouter.get("/start-oauth", limiter, controller.startOAuth.bind(controller));
  oauthRouter.get("/callback", limiter, controller.confirmCallback.bind(controller));
  oauthRouter.post("/callback", limiter, controller.completeCallback.bind(controller));

  return oauthRouter;
};
