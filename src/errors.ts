export class OnshapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OnshapeError';
  }
}

export class AuthenticationError extends OnshapeError {
  constructor(status: number) {
    super(`Onshape rejected the API keys (Status: ${status}). Check ONSHAPE_ACCESS_KEY and ONSHAPE_SECRET_KEY.`);
    this.name = 'AuthenticationError';
  }
}

export class ApiError extends OnshapeError {
  readonly status?: number;
  readonly data?: unknown;

  constructor(message: string, status?: number, data?: unknown) {
    super(`Onshape API Error: ${message}${status ? ` (Status: ${status})` : ''}`);
    this.name = 'ApiError';
    this.status = status;
    this.data = data;
  }
}

export class TranslationFailedError extends OnshapeError {
  readonly translationId?: string;
  readonly reason?: string;

  constructor(reason?: string, translationId?: string) {
    super(`Translation request failed: ${reason ?? 'no reason given'}`);
    this.name = 'TranslationFailedError';
    this.translationId = translationId;
    this.reason = reason;
  }
}

export class TranslationTimeoutError extends OnshapeError {
  constructor(translationId: string, attempts: number) {
    super(`Translation ${translationId} still active after ${attempts} polls`);
    this.name = 'TranslationTimeoutError';
  }
}

export class ConfigurationError extends OnshapeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidUrlError extends OnshapeError {
  constructor(url: string) {
    super(`Not an Onshape document URL: ${url}`);
    this.name = 'InvalidUrlError';
  }
}
