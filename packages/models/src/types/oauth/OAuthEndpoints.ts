/**
 * Absolute URLs of the hosted OAuth helper
 */
export interface OAuthEndpoints {
  baseUrl: string;
  start: string;
  getToken: string;
  refreshToken: string;
}
