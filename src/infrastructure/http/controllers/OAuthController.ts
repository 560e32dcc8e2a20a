import { NextFunction, Request, Response } from "express";
import { BeginAuthorization } from "../../../application/useCases/oauth/BeginAuthorization";
import { HandleAuthorizationCallback } from "../../../application/useCases/oauth/HandleAuthorizationCallback";
import { InternalError } from "../../../domain/errors/AppError";
import { parseCallbackBody, parseCallbackQuery } from "../schemas/callback";
import { ExpressPendingStateSession } from "../session/ExpressPendingStateSession";

export class OAuthController {
  constructor(
    private readonly beginAuthorization: BeginAuthorization,
    private readonly handleCallback: HandleAuthorizationCallback
  ) {}

  /**
   * GET /start-oauth
   */
  startOAuth(req: Request, res: Response, next: NextFunction): void {
    try {
      const target = this.beginAuthorization.execute(new ExpressPendingStateSession(req.session));
      res.redirect(302, target.redirectUrl);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /callback: confirma state e campos, devolve o code sem trocar
   */
  async confirmCallback(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const outcome = await this.handleCallback.execute(
        "GET",
        parseCallbackQuery(req.query),
        new ExpressPendingStateSession(req.session)
      );
      if (outcome.kind !== "CODE_CONFIRMED") {
        throw new Error(`Unexpected callback outcome ${outcome.kind}`);
      }
      res.status(200).json({ message: "GET request successful", auth_code: outcome.authCode });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /callback: valida e troca o code pelo refresh token
   */
  async completeCallback(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      // Sem corpo JSON não há o que validar: falha interna, como corpo malformado
      if (!req.is("application/json")) {
        throw new InternalError("Request body must be application/json");
      }
      await this.handleCallback.execute(
        "POST",
        parseCallbackBody(req.body),
        new ExpressPendingStateSession(req.session)
      );
      res.status(200).json({ message: "Authorization successful" });
    } catch (error) {
      next(error);
    }
  }
}
