/** Raised when a rate limiter is constructed with a non-positive quota or window. */
export class InvalidRateLimiterConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRateLimiterConfigError";
  }
}

/** Non-2xx response worth retrying (429 or 5xx) or otherwise unusable. */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, url?: string) {
    super(url ? `HTTP ${status} for ${url}` : `HTTP ${status}`);
    this.name = "HttpError";
    this.status = status;
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

/** Steam answered but reported `success: false` for the app. */
export class SteamApiError extends Error {
  readonly appid: number;

  constructor(appid: number, message = `API success=false for appid ${appid}`) {
    super(message);
    this.name = "SteamApiError";
    this.appid = appid;
  }
}

export class InvalidAppIdError extends Error {
  readonly token: string;

  constructor(token: string) {
    super(`Invalid Steam app ID: ${JSON.stringify(token)}`);
    this.name = "InvalidAppIdError";
    this.token = token;
  }
}
