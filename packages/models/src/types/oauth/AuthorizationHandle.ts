/**
 * A started hosted authorization flow
 */
export interface AuthorizationHandle {
  /** URL the user opens in a browser to grant consent */
  authorizationUrl: string;
  /** Correlation handle the flow is completed with */
  state: string;
  startedAt: Date;
  /** How often the token endpoint is polled while the user consents */
  pollIntervalMs: number;
}
