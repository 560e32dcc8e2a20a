export type AppErrorKind = "CONFIG_ERROR" | "VALIDATION_ERROR" | "UPSTREAM_ERROR" | "INTERNAL_ERROR";

/**
 * Base dos erros da aplicação. Cada subclasse corresponde a um tipo fechado
 * (`AppErrorKind`) com status HTTP fixo, mapeado pelo errorHandler.
 */
export abstract class AppError extends Error {
  abstract readonly kind: AppErrorKind;
  readonly statusCode: number;

  protected constructor(message: string, statusCode: number) {
    super(message);
    this.statusCode = statusCode;
  }
}

/**
 * Configuração inválida no boot. Fatal: o processo não deve subir.
 */
export class ConfigError extends AppError {
  readonly kind = "CONFIG_ERROR";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment variables: ${issues.join("; ")}`, 500);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class ValidationError extends AppError {
  readonly kind = "VALIDATION_ERROR";
  readonly missing?: string[];

  constructor(message: string, options: { missing?: string[] } = {}) {
    super(message, 400);
    this.name = "ValidationError";
    this.missing = options.missing;
  }
}

/**
 * Falha no provedor (LWA). `details` carrega o corpo devolvido pelo provedor,
 * ou a mensagem de transporte quando não houve resposta.
 */
export class UpstreamError extends AppError {
  readonly kind = "UPSTREAM_ERROR";
  readonly details: unknown;
  readonly upstreamStatus?: number;

  constructor(params: { message: string; details: unknown; upstreamStatus?: number }) {
    super(params.message, 400);
    this.name = "UpstreamError";
    this.details = params.details;
    this.upstreamStatus = params.upstreamStatus;
  }
}

export class InternalError extends AppError {
  readonly kind = "INTERNAL_ERROR";

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, 500);
    this.name = "InternalError";
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  static from(error: unknown): InternalError {
    if (error instanceof InternalError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new InternalError(message, { cause: error });
  }
}
