import JSZip from 'jszip';
import type { TrialRecord } from '../engine/view';
import type { EventRecord } from '../types';

export function buildSessionZip(options: {
  record: TrialRecord;
  config: { boxCount: number; gridColumns: number; payoffPerBox: number };
  events: EventRecord[];
}) {
  const { record, config, events } = options;
  const own = events.filter(e => e.sessionId === record.sessionId);

  const sessionJson = {
    session: { id: record.sessionId, createdAt: record.startedAt, participantId: record.participantId },
    config,
    record,
  };

  const zip = new JSZip();
  zip.file('session/session.json', JSON.stringify(sessionJson, null, 2));
  zip.file('session/events.json', JSON.stringify(own, null, 2));
  return zip;
}

export async function downloadSessionZip(options: Parameters<typeof buildSessionZip>[0]) {
  const zip = buildSessionZip(options);
  const blob = await zip.generateAsync({ type: 'blob' });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url; a.download = `bret_session_${options.record.sessionId}.zip`; a.click();
  URL.revokeObjectURL(url);
}
