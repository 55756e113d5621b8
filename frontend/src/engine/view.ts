import type { TrialState } from './trial';
import { isoOrNull } from '../utils/time';

export const HIDDEN = 'hidden' as const;
export type Hidden = typeof HIDDEN;

type ViewBase = {
  readonly sessionId: string;
  readonly boxCount: number;
  readonly gridColumns: number;
  readonly payoffPerBox: number;
  readonly openedCount: number;
};

export type RenderView =
  | (ViewBase & { readonly revealed: false; readonly bombIndex: Hidden; readonly outcome: Hidden; readonly payoff: Hidden })
  | (ViewBase & { readonly revealed: true; readonly bombIndex: number; readonly outcome: 'safe' | 'bombed'; readonly payoff: number });

/**
 * Projection handed to renderers. Nothing derived from the bomb position
 * appears in it until the trial is revealed.
 */
export function snapshot(state: TrialState): RenderView {
  const base: ViewBase = {
    sessionId: state.sessionId,
    boxCount: state.config.boxCount,
    gridColumns: state.config.gridColumns,
    payoffPerBox: state.config.payoffPerBox,
    openedCount: state.openedCount
  };
  if (!state.revealed) {
    return { ...base, revealed: false, bombIndex: HIDDEN, outcome: HIDDEN, payoff: HIDDEN };
  }
  return { ...base, revealed: true, bombIndex: state.bombIndex, outcome: state.outcome, payoff: state.payoff };
}

export function canOpenNext(view: RenderView) {
  return !view.revealed && view.openedCount < view.boxCount;
}

export function canStop(view: RenderView) {
  return !view.revealed && view.openedCount > 0;
}

export type CellLabel = 'closed' | 'opened' | 'opened-safe' | 'bomb';

/** `i` is 1-based. */
export function cellLabel(view: RenderView, i: number): CellLabel {
  if (!view.revealed) return i <= view.openedCount ? 'opened' : 'closed';
  if (i === view.bombIndex) return 'bomb';
  if (i <= view.openedCount) return 'opened-safe';
  return 'closed';
}

export type TrialRecord = {
  sessionId: string;
  participantId: string | null;
  boxCount: number;
  openedCount: number;
  payoffPerBox: number;
  bombIndex: number | Hidden;
  outcome: 'safe' | 'bombed' | Hidden;
  payoff: number | Hidden;
  startedAt: string | null;
  revealedAt: string | null;
  decisionMs: number | null;
};

export function exportRecord(state: TrialState, participantId: string | null = null): TrialRecord {
  const view = snapshot(state);
  return {
    sessionId: view.sessionId,
    participantId: participantId?.trim() || null,
    boxCount: view.boxCount,
    openedCount: view.openedCount,
    payoffPerBox: view.payoffPerBox,
    bombIndex: view.bombIndex,
    outcome: view.outcome,
    payoff: view.payoff,
    startedAt: isoOrNull(state.startedAt),
    revealedAt: isoOrNull(state.revealedAt),
    decisionMs: state.revealed ? state.revealedAt - state.startedAt : null
  };
}
