/**
 * Error taxonomy. Every action catches at its own boundary and answers { code, message };
 * nothing is retried.
 */

import type { Response } from 'express';
import type { RaidErrorCode, RaidErrorInfo } from '../src/types/raid';
import { log } from './utils/log';

export class AppError extends Error {
  readonly code: RaidErrorCode;
  readonly status: number;

  constructor(code: RaidErrorCode, status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }

  toJSON(): RaidErrorInfo {
    return { code: this.code, message: this.message };
  }
}

/** Bad user input; fixed by entering it again */
export class ValidationError extends AppError {
  constructor(message: string) {
    super('invalid', 400, message);
  }
}

/** A credential is missing; the feature stays disabled until it is configured */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('not_configured', 503, message);
  }
}

export class NotConnectedError extends AppError {
  constructor(message = 'Connect to the spreadsheet service first') {
    super('not_connected', 409, message);
  }
}

/** The remote service reported a failure; its message is passed on as is */
export class RemoteError extends AppError {
  constructor(message: string) {
    super('remote_error', 502, message);
  }
}

export class NetworkError extends AppError {
  constructor(message = 'Could not reach the remote service') {
    super('network_error', 504, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('not_found', 404, message);
  }
}

export function sendError(res: Response, err: unknown, tag: string): void {
  if (err instanceof AppError) {
    if (!(err instanceof ValidationError)) {
      log.warn(tag, `${err.code}: ${err.message}`);
    }
    res.status(err.status).json(err.toJSON());
    return;
  }
  log.error(tag, 'unexpected failure', err);
  const body: RaidErrorInfo = { code: 'internal', message: 'Internal error' };
  res.status(500).json(body);
}
