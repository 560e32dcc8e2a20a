// Estados de uma tentativa de autorização. Terminais: REJECTED_*, CREDENTIAL_STORED e EXCHANGE_FAILED.
export type AuthorizationAttemptState =
  | "STARTED"
  | "NONCE_ISSUED"
  | "CALLBACK_RECEIVED"
  | "REJECTED_STATE_MISMATCH"
  | "REJECTED_MISSING_FIELDS"
  | "EXCHANGED"
  | "CREDENTIAL_STORED"
  | "EXCHANGE_FAILED";

export type CallbackMethod = "GET" | "POST";

export interface CallbackParams {
  code: unknown;
  state: unknown;
  partnerId: unknown;
}

export interface ValidatedCallback {
  code: string;
  state: string;
  partnerId: string;
}

export type CallbackOutcome =
  | { kind: "CODE_CONFIRMED"; authCode: string }
  | { kind: "CREDENTIAL_STORED"; partnerId: string };

export interface RedirectTarget {
  redirectUrl: string;
  state: string;
}
