import type { ReauthorizationReason } from '../types/index.js';

export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super('config_invalid', message);
    this.keys = keys;
  }
}

export class StateMismatchError extends AppError {
  constructor() {
    super('state_mismatch', 'OAuth state does not match the authorization that was started; sign in again');
  }
}

export class AuthorizationDeniedError extends AppError {
  constructor(reason: string) {
    super('authorization_denied', `Authorization was not granted: ${reason}`);
  }
}

export class TokenExchangeError extends AppError {
  constructor(cause: unknown) {
    super('token_exchange_failed', `Could not exchange the authorization code: ${describeError(cause)}`, { cause });
  }
}

const REAUTH_MESSAGES: Record<ReauthorizationReason, string> = {
  missing: 'Not signed in',
  scope: 'Stored credential is missing a required scope',
  expired: 'Stored credential has expired and cannot be refreshed',
  'refresh-failed': 'Refreshing the stored credential failed',
};

export class ReauthorizationRequiredError extends AppError {
  readonly reason: ReauthorizationReason;

  constructor(reason: ReauthorizationReason, options?: { cause?: unknown }) {
    super('reauthorization_required', `${REAUTH_MESSAGES[reason]}; run "yt-pruner auth login"`, options);
    this.reason = reason;
  }
}

export class AuthTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super('auth_timeout', `No authorization callback received within ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class YouTubeApiError extends AppError {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super('youtube_api_error', message, options);
    this.status = status;
  }

  get isAuthFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

export class PaginationError extends AppError {
  constructor(message: string) {
    super('pagination_error', message);
  }
}

export class SelectionError extends AppError {
  constructor(message: string) {
    super('invalid_selection', message);
  }
}

export class InvalidDateError extends AppError {
  constructor(value: string) {
    super('invalid_date', `Cannot read "${value}" as a date; use YYYY-MM-DD or an ISO-8601 timestamp`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
