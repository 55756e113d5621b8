import { z } from 'zod';
import type { TrialRecord } from '../engine/view';

export const StoredRecordSchema = z.object({
  sessionId: z.string(),
  participantId: z.string().nullable(),
  boxCount: z.number(),
  openedCount: z.number(),
  payoffPerBox: z.number(),
  bombIndex: z.number(),
  outcome: z.enum(['safe', 'bombed']),
  payoff: z.number(),
  startedAt: z.string().nullable(),
  revealedAt: z.string().nullable(),
  decisionMs: z.number().nullable(),
  receivedAt: z.number()
});

export type StoredRecord = z.infer<typeof StoredRecordSchema>;

export type RecordsClient = {
  post: (rec: TrialRecord) => Promise<void>;
  history: (limit?: number) => Promise<StoredRecord[]>;
};

type Fetch = typeof fetch;

export function createRecordsClient(baseUrl: string, token?: string, fetchImpl: Fetch = fetch): RecordsClient {
  const root = baseUrl.replace(/\/+$/, '');
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (token) headers.Authorization = `Bearer ${token}`;

  async function request(path: string, init?: RequestInit): Promise<unknown> {
    const res = await fetchImpl(`${root}${path}`, { ...init, headers });
    if (!res.ok) throw new Error(`[records] ${init?.method ?? 'GET'} ${path} failed with ${res.status}`);
    return res.json();
  }

  return {
    async post(rec) {
      await request('/api/records', { method: 'POST', body: JSON.stringify(rec) });
    },
    async history(limit = 50) {
      const rows = await request(`/api/records/history?limit=${limit}`);
      return z.array(StoredRecordSchema).parse(rows);
    }
  };
}

const url = import.meta.env.VITE_API_URL;
const token = import.meta.env.VITE_API_TOKEN;

export const recordsClient: RecordsClient | null = url ? createRecordsClient(url, token) : null;
if (!recordsClient) {
  console.warn('[records] Upload disabled: set VITE_API_URL');
}
