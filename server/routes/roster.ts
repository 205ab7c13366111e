/**
 * Roster API (list / add / delete / CSV export+import / spreadsheet import)
 */

import { Router, Request, Response } from 'express';
import type { SpreadsheetImporter } from '../clients/spreadsheetImporter';
import { sendError, ValidationError } from '../errors';
import { importRosterCsv, ROSTER_CSV_FILENAME, rosterToCsv } from '../roster/rosterCsv';
import { addPlayer, deletePlayer, replaceRoster } from '../roster/rosterOps';
import type { SessionStorage } from '../storage/SessionStorage';
import { log } from '../utils/log';
import { readField, readText, resolveSession } from './session';

const TAG = 'Roster';

export interface RosterDeps {
  sessions: SessionStorage;
  spreadsheetImporter: SpreadsheetImporter;
}

export function createRosterRouter(deps: RosterDeps): Router {
  const router = Router();
  const { sessions, spreadsheetImporter } = deps;

  // GET /v1/roster
  router.get('/roster', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    res.json({ items: state.roster });
  });

  // POST /v1/roster
  router.post('/roster', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    try {
      const record = addPlayer(state, readField(req.body, 'name'), readField(req.body, 'characters'));
      res.status(201).json(record);
    } catch (e) {
      sendError(res, e, TAG);
    }
  });

  // GET /v1/roster/export.csv
  router.get('/roster/export.csv', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    res.attachment(ROSTER_CSV_FILENAME);
    res.type('text/csv');
    res.send(rosterToCsv(state.roster));
  });

  // DELETE /v1/roster/:index
  router.delete('/roster/:index', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    const raw = req.params.index;
    const index = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : -1;
    res.json({ removed: deletePlayer(state, index) });
  });

  // POST /v1/roster/import/csv  (text/csv body)
  router.post('/roster/import/csv', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    try {
      const text: unknown = req.body;
      if (typeof text !== 'string' || text.trim().length === 0) {
        throw new ValidationError('Upload a CSV file');
      }
      const outcome = importRosterCsv(state, text);
      log.info(TAG, `csv import: ${outcome.imported} imported, ${outcome.skipped} skipped`);
      res.json(outcome);
    } catch (e) {
      sendError(res, e, TAG);
    }
  });

  // POST /v1/spreadsheet/connect
  router.post('/spreadsheet/connect', async (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    try {
      state.spreadsheet = await spreadsheetImporter.connect();
      res.json({ connected: true, clientEmail: state.spreadsheet.clientEmail });
    } catch (e) {
      sendError(res, e, TAG);
    }
  });

  // POST /v1/roster/import/spreadsheet
  router.post('/roster/import/spreadsheet', async (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    try {
      const mapped = await spreadsheetImporter.importFromSpreadsheet(
        state.spreadsheet,
        readText(req.body, 'url'),
        readText(req.body, 'worksheet')
      );
      res.json(replaceRoster(state, mapped));
    } catch (e) {
      sendError(res, e, TAG);
    }
  });

  return router;
}
