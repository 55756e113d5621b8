import { describe, it, expect } from 'vitest';
import { buildSessionZip } from './zip';
import type { TrialRecord } from '../engine/view';
import type { EventRecord } from '../types';

const record: TrialRecord = {
  sessionId: 'S-1',
  participantId: 'P-1',
  boxCount: 10,
  openedCount: 4,
  payoffPerBox: 10,
  bombIndex: 5,
  outcome: 'safe',
  payoff: 40,
  startedAt: '2024-01-01T00:00:00.000Z',
  revealedAt: '2024-01-01T00:00:09.000Z',
  decisionMs: 9000,
};

const events: EventRecord[] = [
  { t: 1, type: 'trial_reset', sessionId: 'S-0' },
  { t: 2, type: 'trial_reset', sessionId: 'S-1' },
  { t: 3, type: 'box_open', sessionId: 'S-1', payload: { openedCount: 1 } },
];

describe('buildSessionZip', () => {
  it('writes the session summary', async () => {
    const zip = buildSessionZip({ record, config: { boxCount: 10, gridColumns: 5, payoffPerBox: 10 }, events });
    const text = await zip.file('session/session.json')?.async('string');
    expect(JSON.parse(text ?? 'null')).toEqual({
      session: { id: 'S-1', createdAt: '2024-01-01T00:00:00.000Z', participantId: 'P-1' },
      config: { boxCount: 10, gridColumns: 5, payoffPerBox: 10 },
      record,
    });
  });

  it('keeps only the events of the exported session', async () => {
    const zip = buildSessionZip({ record, config: { boxCount: 10, gridColumns: 5, payoffPerBox: 10 }, events });
    const text = await zip.file('session/events.json')?.async('string');
    expect(JSON.parse(text ?? 'null')).toEqual(events.slice(1));
  });
});
