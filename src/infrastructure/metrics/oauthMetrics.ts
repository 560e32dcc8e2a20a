import { Counter, register } from "prom-client";

export const authorizationsStarted = new Counter({
  name: "spapi_oauth_authorizations_started_total",
  help: "Fluxos de autorização iniciados (nonce emitido)",
});

export const callbacksTotal = new Counter({
  name: "spapi_oauth_callbacks_total",
  help: "Callbacks recebidos por método e resultado",
  labelNames: ["method", "outcome"] as const,
});

export const tokenExchangesTotal = new Counter({
  name: "spapi_oauth_token_exchanges_total",
  help: "Chamadas ao endpoint de token da LWA por grant_type e resultado",
  labelNames: ["grant_type", "outcome"] as const,
});

export { register as metricsRegistry };
