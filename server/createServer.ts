/**
 * Express app factory. Tests build it with fakes; index.ts with the real clients.
 */

import express, { type ErrorRequestHandler, type Express, Request, Response } from 'express';
import { createGoogleSheetsGateway } from './clients/googleSheetsGateway';
import { createReportClient, type ReportClient } from './clients/reportClient';
import { createSpreadsheetImporter, type SpreadsheetGateway, type SpreadsheetImporter } from './clients/spreadsheetImporter';
import { loadConfig, type RaidConfig } from './config';
import { sendError, ValidationError } from './errors';
import { createAttendanceRouter } from './routes/attendance';
import { createRosterRouter } from './routes/roster';
import { createSessionRouter, SESSION_HEADER } from './routes/session';
import { createMemorySessionStorage, type SessionStorage } from './storage/SessionStorage';

export interface ServerDeps {
  config?: RaidConfig;
  sessions?: SessionStorage;
  reportClient?: ReportClient;
  spreadsheetGateway?: SpreadsheetGateway;
  spreadsheetImporter?: SpreadsheetImporter;
}

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Request body could not be parsed',
  'entity.too.large': 'Request body is too large',
};

/** body-parser tags its failures with a `type` string */
function bodyErrorType(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('type' in err)) return null;
  return typeof err.type === 'string' ? err.type : null;
}

/** Last handler: anything that escaped a router still answers { code, message } */
const handleUncaught: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const type = bodyErrorType(err);
  const message = type ? BODY_ERROR_MESSAGES[type] : undefined;
  sendError(res, message ? new ValidationError(message) : err, 'Server');
};

export function createServer(deps: ServerDeps = {}): Express {
  const config = deps.config ?? loadConfig();
  const sessions = deps.sessions ?? createMemorySessionStorage({ ttlMs: config.sessionTtlMs });
  const reportClient = deps.reportClient ?? createReportClient({ config });
  const spreadsheetImporter =
    deps.spreadsheetImporter ??
    createSpreadsheetImporter({ config, gateway: deps.spreadsheetGateway ?? createGoogleSheetsGateway() });

  const app = express();
  app.use(express.json());
  app.use(express.text({ type: ['text/csv', 'text/plain'], limit: '1mb' }));
  app.use((_req, res, next) => {
    res.setHeader('Access-Control-Expose-Headers', SESSION_HEADER);
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use('/v1', createSessionRouter({ sessions, config }));
  app.use('/v1', createRosterRouter({ sessions, spreadsheetImporter }));
  app.use('/v1', createAttendanceRouter({ sessions, reportClient }));
  app.use(handleUncaught);

  return app;
}
