import session, { Store } from "express-session";

export interface SessionMiddlewareOptions {
  secret: string;
  secureCookies: boolean;
  store?: Store;
}

/**
 * Cookie `session` assinado, sem maxAge (expira com o navegador).
 * SameSite=None exige Secure; em http local cai para lax.
 * Sem `store`, o express-session usa o MemoryStore do processo.
 */
export const createSessionMiddleware = ({ secret, secureCookies, store }: SessionMiddlewareOptions) =>
  session({
    name: "session",
    secret,
    store,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      secure: secureCookies,
      sameSite: secureCookies ? "none" : "lax",
      path: "/",
    },
  });
