export type TokenType = 'bearer';

export interface LoginResponse {
  access_token: string;
  refresh_token: string;
  token_type: TokenType;
}

export interface RefreshResponse {
  access_token: string;
  token_type: TokenType;
}
