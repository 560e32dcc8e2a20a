import { z } from "zod";
import { CallbackParams } from "../../../domain/oauth/AuthorizationAttempt";

// Os valores ficam `unknown`: presença e igualdade do state são regras do use case
export const callbackQuerySchema = z.object({
  spapi_oauth_code: z.unknown(),
  state: z.unknown(),
  selling_partner_id: z.unknown(),
});

export const callbackBodySchema = z.object({
  code: z.unknown(),
  state: z.unknown(),
  selling_partner_id: z.unknown(),
});

const EMPTY_PARAMS: CallbackParams = { code: undefined, state: undefined, partnerId: undefined };

export const parseCallbackQuery = (query: unknown): CallbackParams => {
  const parsed = callbackQuerySchema.safeParse(query);
  if (!parsed.success) return EMPTY_PARAMS;
  return {
    code: parsed.data.spapi_oauth_code,
    state: parsed.data.state,
    partnerId: parsed.data.selling_partner_id,
  };
};

export const parseCallbackBody = (body: unknown): CallbackParams => {
  const parsed = callbackBodySchema.safeParse(body);
  if (!parsed.success) return EMPTY_PARAMS;
  return {
    code: parsed.data.code,
    state: parsed.data.state,
    partnerId: parsed.data.selling_partner_id,
  };
};
