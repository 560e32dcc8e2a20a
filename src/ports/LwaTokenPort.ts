export interface AuthorizationCodeGrant {
  refreshToken: string;
  accessToken?: string;
  expiresIn?: number;
}

export interface LwaTokenPort {
  exchangeAuthorizationCode(code: string, redirectUri: string): Promise<AuthorizationCodeGrant>;
  refreshAccessToken(refreshToken: string): Promise<string>;
}
