import { Router } from 'express';
import { z } from 'zod';
import { TrialRecordSchema, type TrialRecord } from '../types/record.js';
import { RecordStore } from '../services/store.js';
import { SseHub } from '../services/sse.js';
import { toCsv } from '../services/csv.js';
import { auth } from '../middleware/auth.js';

const ListQuery = z.object({
  participantId: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional()
});

export function createRecordsRouter(
  store: RecordStore,
  opts: { authToken?: string; sse?: SseHub<TrialRecord> } = {}
) {
  const router = Router();
  const sse = opts.sse ?? new SseHub<TrialRecord>();

  router.use(auth(opts.authToken));

  // POST /api/records
  router.post('/', (req, res, next) => {
    try {
      const parsed = TrialRecordSchema.parse(req.body);
      if (store.has(parsed.sessionId)) {
        return res.status(409).json({ error: 'Conflict' });
      }
      const record: TrialRecord = {
        sessionId: parsed.sessionId,
        participantId: parsed.participantId ?? null,
        boxCount: parsed.boxCount,
        payoffPerBox: parsed.payoffPerBox,
        openedCount: parsed.openedCount,
        bombIndex: parsed.bombIndex,
        outcome: parsed.outcome,
        payoff: parsed.payoff,
        startedAt: parsed.startedAt ?? null,
        revealedAt: parsed.revealedAt ?? null,
        decisionMs: parsed.decisionMs ?? null,
        receivedAt: Date.now()
      };
      store.add(record);
      sse.broadcast('record', record);
      // eslint-disable-next-line no-console
      console.info(`[records] ${record.sessionId} ${record.outcome} payoff=${record.payoff}`);
      return res.status(201).json({ ok: true });
    } catch (e) {
      return next(e);
    }
  });

  // GET /api/records/latest?participantId=...
  router.get('/latest', (req, res, next) => {
    try {
      const qp = ListQuery.parse(req.query);
      const latest = store.latest(qp.participantId);
      if (!latest) return res.status(404).json({ error: 'NotFound' });
      return res.json(latest);
    } catch (e) {
      return next(e);
    }
  });

  // GET /api/records/history?participantId=...&limit=100
  router.get('/history', (req, res, next) => {
    try {
      const qp = ListQuery.parse(req.query);
      return res.json(store.history(qp.participantId, qp.limit ?? 100));
    } catch (e) {
      return next(e);
    }
  });

  // GET /api/records/export.csv?participantId=...
  router.get('/export.csv', (req, res, next) => {
    try {
      const qp = ListQuery.parse(req.query);
      const rows = store.history(qp.participantId, qp.limit ?? 1000);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', 'attachment; filename="bret_records.csv"');
      return res.send(toCsv(rows));
    } catch (e) {
      return next(e);
    }
  });

  // GET /api/records/stream (SSE)
  router.get('/stream', (req, res) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const id = sse.addClient(res);
    sse.send(res, 'hello', { ok: true });

    req.on('close', () => sse.removeClient(id));
  });

  // GET /api/records/:sessionId
  router.get('/:sessionId', (req, res) => {
    const rec = store.get(req.params.sessionId);
    if (!rec) return res.status(404).json({ error: 'NotFound' });
    return res.json(rec);
  });

  return router;
}
