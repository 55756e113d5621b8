import { parseTrialConfig, type TrialConfig } from './config';
import { InvalidTransition, TrialError } from './errors';
import { defaultRandom, drawIndex, rid, type RandomSource } from './random';
import { fmtRunStamp } from '../utils/time';

export type Outcome = 'unrevealed' | 'safe' | 'bombed';

type TrialBase = {
  readonly config: TrialConfig;
  readonly sessionId: string;
  readonly bombIndex: number;
  readonly openedCount: number;
  readonly startedAt: number;
};

export type InProgressTrial = TrialBase & {
  readonly revealed: false;
  readonly outcome: 'unrevealed';
  readonly payoff: null;
  readonly revealedAt: null;
};

export type RevealedTrial = TrialBase & {
  readonly revealed: true;
  readonly outcome: 'safe' | 'bombed';
  readonly payoff: number;
  readonly revealedAt: number;
};

export type TrialState = InProgressTrial | RevealedTrial;

export type EngineDeps = {
  random?: RandomSource;
  now?: () => number;
  createSessionId?: (now: number, random: RandomSource) => string;
};

export function defaultSessionId(now: number, random: RandomSource) {
  return `${fmtRunStamp(new Date(now))}-${rid(random, 4)}`;
}

export function reset(config: TrialConfig, deps: EngineDeps = {}): InProgressTrial {
  const cfg = parseTrialConfig(config);
  const random = deps.random ?? defaultRandom;
  const now = (deps.now ?? Date.now)();
  const bombIndex = drawIndex(random, cfg.boxCount);
  const sessionId = (deps.createSessionId ?? defaultSessionId)(now, random);
  const fresh: InProgressTrial = {
    config: cfg,
    sessionId,
    bombIndex,
    openedCount: 0,
    startedAt: now,
    revealed: false,
    outcome: 'unrevealed',
    payoff: null,
    revealedAt: null
  };
  return Object.freeze(fresh);
}

export function openNext(state: TrialState): InProgressTrial {
  if (state.revealed) {
    throw new InvalidTransition('trial.openNext', 'trial already revealed', { sessionId: state.sessionId });
  }
  if (state.openedCount >= state.config.boxCount) {
    throw new InvalidTransition('trial.openNext', 'all boxes already opened', {
      openedCount: state.openedCount,
      boxCount: state.config.boxCount
    });
  }
  const next: InProgressTrial = { ...state, openedCount: state.openedCount + 1 };
  return Object.freeze(next);
}

export function stop(state: TrialState, deps: Pick<EngineDeps, 'now'> = {}): RevealedTrial {
  if (state.revealed) {
    throw new InvalidTransition('trial.stop', 'trial already revealed', { sessionId: state.sessionId });
  }
  if (state.openedCount < 1) {
    throw new InvalidTransition('trial.stop', 'no box opened yet');
  }
  const bombed = state.bombIndex <= state.openedCount;
  const done: RevealedTrial = {
    ...state,
    revealed: true,
    outcome: bombed ? 'bombed' : 'safe',
    payoff: bombed ? 0 : state.openedCount * state.config.payoffPerBox,
    revealedAt: (deps.now ?? Date.now)()
  };
  return Object.freeze(done);
}

export type TrialAction =
  | { type: 'newGame'; config: TrialConfig }
  | { type: 'openNext' }
  | { type: 'stop' };

export type TransitionResult =
  | { ok: true; state: TrialState }
  | { ok: false; state: TrialState; error: TrialError };

/**
 * UI-facing dispatcher. A rejected action leaves the state untouched and
 * reports the error instead of throwing.
 */
export function transition(state: TrialState, action: TrialAction, deps: EngineDeps = {}): TransitionResult {
  try {
    switch (action.type) {
      case 'newGame':
        return { ok: true, state: reset(action.config, deps) };
      case 'openNext':
        return { ok: true, state: openNext(state) };
      case 'stop':
        return { ok: true, state: stop(state, deps) };
    }
  } catch (e) {
    if (e instanceof TrialError) return { ok: false, state, error: e };
    throw e;
  }
}
