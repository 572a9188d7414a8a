import { AdsErrorBodySchema } from '@credential-keeper/schemas';

export interface AdsApiErrorOptions {
  status?: number;
  remoteStatus?: string;
  cause?: Error;
}

function actionFor(status?: number): string {
  switch (status) {
    case undefined:
      return 'Check network connectivity and call the tool again';
    case 401:
      return 'Call force_refresh, then call the tool again';
    case 403:
      return 'Check the developer token and login_customer_id for this account';
    case 429:
      return 'Wait a minute before calling the tool again';
    default:
      return status >= 500 ? 'Call the tool again later' : 'Correct the request and call the tool again';
  }
}

/**
 * A Google Ads REST call that did not produce a usable response
 * @public
 */
export class AdsApiError extends Error {
  public readonly code = 'ads_api_error';
  public readonly status?: number;
  public readonly remoteStatus?: string;
  public readonly action: string;
  public readonly cause?: Error;

  public constructor(message: string, options: AdsApiErrorOptions = {}) {
    super(message);
    this.name = 'AdsApiError';
    this.status = options.status;
    this.remoteStatus = options.remoteStatus;
    this.cause = options.cause;
    this.action = actionFor(options.status);

    Object.setPrototypeOf(this, AdsApiError.prototype);
  }

  /**
   * Builds the error from a non-2xx response body
   */
  public static fromResponse(operation: string, status: number, body: unknown): AdsApiError {
    const parsed = AdsErrorBodySchema.safeParse(body);
    const detail = parsed.success ? parsed.data.error.message : undefined;
    return new AdsApiError(`${operation} failed with HTTP ${status}${detail ? `: ${detail}` : ''}`, {
      status,
      remoteStatus: parsed.success ? parsed.data.error.status : undefined,
    });
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      action: this.action,
      ...(this.status !== undefined && { status: this.status }),
      ...(this.remoteStatus && { remoteStatus: this.remoteStatus }),
    };
  }
}
