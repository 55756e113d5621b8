import React, { useEffect, useState } from 'react';
import { Link } from 'react-router-dom';
import type { RecordsClient, StoredRecord } from '../services/records';

type Load =
  | { state: 'loading' }
  | { state: 'ready'; rows: StoredRecord[] }
  | { state: 'error'; message: string };

export default function Records({ client }: { client: RecordsClient | null }) {
  const [load, setLoad] = useState<Load>({ state: 'loading' });

  useEffect(() => {
    if (!client) return;
    let cancelled = false;
    void client.history(100).then(
      (rows) => { if (!cancelled) setLoad({ state: 'ready', rows }); },
      (e: unknown) => {
        console.error('[records] history failed', e);
        if (!cancelled) setLoad({ state: 'error', message: e instanceof Error ? e.message : String(e) });
      }
    );
    return () => { cancelled = true; };
  }, [client]);

  return (
    <div className="container">
      <h2>Recorded sessions</h2>
      <p><Link to="/">Back to task</Link></p>
      {!client && <p className="hint">Set VITE_API_URL to list records from the API.</p>}
      {client && load.state === 'loading' && <p>Loading…</p>}
      {client && load.state === 'error' && <p className="error">{load.message}</p>}
      {client && load.state === 'ready' && (
        load.rows.length === 0 ? <p>No records yet.</p> : (
          <table>
            <thead>
              <tr><th>Run ID</th><th>Participant</th><th>Opened</th><th>Bomb</th><th>Outcome</th><th>Payoff</th></tr>
            </thead>
            <tbody>
              {load.rows.map(r => (
                <tr key={r.sessionId}>
                  <td>{r.sessionId}</td>
                  <td>{r.participantId ?? '—'}</td>
                  <td>{r.openedCount} / {r.boxCount}</td>
                  <td>{r.bombIndex}</td>
                  <td>{r.outcome}</td>
                  <td>{r.payoff}</td>
                </tr>
              ))}
            </tbody>
          </table>
        )
      )}
    </div>
  );
}
