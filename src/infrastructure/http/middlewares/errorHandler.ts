import { ErrorRequestHandler } from "express";
import {
  ConfigError,
  InternalError,
  UpstreamError,
  ValidationError,
} from "../../../domain/errors/AppError";
import { logger } from "../../logger";

type KnownAppError = ConfigError | ValidationError | UpstreamError | InternalError;

const toKnownError = (error: unknown): KnownAppError => {
  if (
    error instanceof ValidationError ||
    error instanceof UpstreamError ||
    error instanceof ConfigError ||
    error instanceof InternalError
  ) {
    return error;
  }
  return InternalError.from(error);
};

/**
 * Converte qualquer falha de rota em JSON com `error`. Validação e upstream
 * viram 400; o resto vira 500.
 */
export const createErrorHandler = (options: { exposeInternalErrors: boolean }): ErrorRequestHandler =>
  (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const error = toKnownError(err);

    switch (error.kind) {
      case "VALIDATION_ERROR":
        res.status(error.statusCode).json({
          error: error.message,
          ...(error.missing ? { missing: error.missing } : {}),
        });
        return;
      case "UPSTREAM_ERROR":
        res.status(error.statusCode).json({ error: error.message, details: error.details });
        return;
      case "CONFIG_ERROR":
      case "INTERNAL_ERROR":
        logger.error({
          type: "REQUEST_FAILED",
          message: `Erro inesperado em ${req.method} ${req.path}`,
          error: err,
        });
        res.status(500).json({
          error: options.exposeInternalErrors ? `An error occurred: ${error.message}` : "An error occurred",
        });
        return;
    }
  };
