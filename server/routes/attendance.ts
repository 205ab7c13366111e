/**
 * Attendance checks (report / manual) and the history they produce
 */

import { Router, Request, Response } from 'express';
import type { ParticipantList } from '../../src/types/raid';
import { computeAttendance } from '../attendance/computeAttendance';
import { MANUAL_SOURCE_LABEL, parseManualParticipants, reportSourceLabel } from '../attendance/participants';
import { extractReportId, type ReportClient } from '../clients/reportClient';
import { NotFoundError, sendError, ValidationError } from '../errors';
import { appendHistory, deleteHistoryEntry, findHistoryEntry, listHistory } from '../storage/historyLog';
import type { RaidSessionState, SessionStorage } from '../storage/SessionStorage';
import { attendanceToCsv, historyCsvFilename, toAttendanceView } from '../views/attendanceView';
import { readField, readText, resolveSession } from './session';

const TAG = 'Attendance';

export interface AttendanceDeps {
  sessions: SessionStorage;
  reportClient: ReportClient;
}

const INVALID_LINK_MESSAGE = 'Invalid link: it must contain the report code';

/**
 * One check = one history entry. An empty participant list records nothing.
 */
function recordCheck(state: RaidSessionState, participants: ParticipantList, source: string) {
  if (participants.length === 0) {
    throw new ValidationError('No participants to check');
  }
  const results = computeAttendance(state.roster, participants);
  const entry = appendHistory(state, source, results);
  return toAttendanceView(entry, participants.length);
}

export function createAttendanceRouter(deps: AttendanceDeps): Router {
  const router = Router();
  const { sessions, reportClient } = deps;

  // GET /v1/reports/extract-id?url=
  router.get('/reports/extract-id', (req: Request, res: Response) => {
    const url = typeof req.query.url === 'string' ? req.query.url : '';
    const reportId = extractReportId(url);
    if (!reportId) {
      sendError(res, new ValidationError(INVALID_LINK_MESSAGE), TAG);
      return;
    }
    res.json({ reportId });
  });

  // POST /v1/attendance/report
  router.post('/attendance/report', async (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    try {
      const url = readText(req.body, 'url');
      const reportId = url ? extractReportId(url) : readText(req.body, 'reportId') || null;
      if (!reportId) {
        throw new ValidationError(INVALID_LINK_MESSAGE);
      }
      const report = await reportClient.fetchParticipants(reportId);
      const view = recordCheck(state, report.participants, reportSourceLabel(report));
      res.json({ ...view, reportId, title: report.title, context: report.context });
    } catch (e) {
      sendError(res, e, TAG);
    }
  });

  // POST /v1/attendance/manual
  router.post('/attendance/manual', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    try {
      const raw = readField(req.body, 'participants') ?? readField(req.body, 'characters');
      const participants = parseManualParticipants(raw);
      res.json(recordCheck(state, participants, MANUAL_SOURCE_LABEL));
    } catch (e) {
      sendError(res, e, TAG);
    }
  });

  // GET /v1/history
  router.get('/history', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    res.json({ items: listHistory(state) });
  });

  // GET /v1/history/:id/export.csv
  router.get('/history/:id/export.csv', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    const entry = findHistoryEntry(state, req.params.id);
    if (!entry) {
      sendError(res, new NotFoundError('History entry not found'), TAG);
      return;
    }
    res.attachment(historyCsvFilename(entry));
    res.type('text/csv');
    res.send(attendanceToCsv(entry.results));
  });

  // DELETE /v1/history/:id
  router.delete('/history/:id', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    res.json({ removed: deleteHistoryEntry(state, req.params.id) });
  });

  return router;
}
