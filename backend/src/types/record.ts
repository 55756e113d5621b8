import { z } from 'zod';

export const TrialRecordSchema = z.object({
  sessionId: z.string().min(1),
  participantId: z.string().min(1).nullable().optional(),
  boxCount: z.number().int().min(10),
  openedCount: z.number().int().positive(),
  payoffPerBox: z.number().positive(),
  bombIndex: z.number().int().positive(),
  outcome: z.enum(['safe', 'bombed']),
  payoff: z.number().nonnegative(),
  startedAt: z.string().datetime().nullable().optional(),
  revealedAt: z.string().datetime().nullable().optional(),
  decisionMs: z.number().int().nonnegative().nullable().optional()
}).superRefine((r, ctx) => {
  if (r.openedCount > r.boxCount) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['openedCount'], message: 'openedCount exceeds boxCount' });
  }
  if (r.bombIndex > r.boxCount) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bombIndex'], message: 'bombIndex exceeds boxCount' });
  }
  const bombed = r.bombIndex <= r.openedCount;
  if (r.outcome !== (bombed ? 'bombed' : 'safe')) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['outcome'], message: 'outcome does not match bombIndex and openedCount' });
  }
  const expected = bombed ? 0 : r.openedCount * r.payoffPerBox;
  if (Math.abs(r.payoff - expected) > 1e-9) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['payoff'], message: `payoff should be ${expected}` });
  }
});

export type TrialRecord = {
  sessionId: string;
  participantId: string | null;
  boxCount: number;
  payoffPerBox: number;
  openedCount: number;
  bombIndex: number;
  outcome: 'safe' | 'bombed';
  payoff: number;
  startedAt: string | null;
  revealedAt: string | null;
  decisionMs: number | null;
  receivedAt: number;
};
