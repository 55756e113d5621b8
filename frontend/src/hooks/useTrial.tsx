import React, { createContext, useCallback, useContext, useEffect, useMemo, useRef, useState } from 'react';
import { z } from 'zod';
import { reset, transition, type EngineDeps, type TrialAction, type TrialState } from '../engine/trial';
import { snapshot, exportRecord, type RenderView, type TrialRecord } from '../engine/view';
import { clampSettings, settingsToConfig, DEFAULT_SETTINGS, type Settings } from '../engine/config';
import { useEventLog } from './useEventLog';
import { storage } from '../services/storage';
import { recordsClient, type RecordsClient } from '../services/records';
import type { EventRecord, UploadStatus } from '../types';

type Ctx = {
  view: RenderView;
  timing: { startedAt: number; revealedAt: number | null };
  record: TrialRecord;
  revealing: boolean;
  settings: Settings;
  events: EventRecord[];
  upload: UploadStatus;
  updateSettings: (patch: Partial<Settings>) => void;
  newGame: () => void;
  openNext: () => void;
  stop: () => void;
};

const TrialCtx = createContext<Ctx | null>(null);

const KEY = 'bret.settings';

const StoredSettingsSchema = z.object({
  payoffPerBox: z.number(),
  boxCount: z.number(),
  gridColumns: z.number(),
  participantId: z.string()
}).partial();

function readSettings(): Settings {
  const defaults: Settings = { ...DEFAULT_SETTINGS, participantId: '' };
  try {
    const parsed = StoredSettingsSchema.safeParse(storage.get(KEY));
    if (!parsed.success) return defaults;
    return clampSettings({ ...defaults, ...parsed.data });
  } catch (e) {
    console.warn('[trial] ignoring stored settings', e);
    return defaults;
  }
}

function writeSettings(s: Settings) {
  try {
    storage.set(KEY, s);
  } catch (e) {
    console.warn('[trial] could not store settings', e);
  }
}

function resetEvent(trial: TrialState): EventRecord {
  return { t: trial.startedAt, type: 'trial_reset', sessionId: trial.sessionId, payload: { config: trial.config } };
}

export function TrialProvider({
  children,
  deps,
  client = recordsClient,
  revealDelayMs = 300,
}: {
  children: React.ReactNode;
  deps?: EngineDeps;
  client?: RecordsClient | null;
  revealDelayMs?: number;
}) {
  const depsRef = useRef<EngineDeps>(deps ?? {});
  const [settings, setSettings] = useState<Settings>(() => readSettings());
  const [initial] = useState<TrialState>(() => reset(settingsToConfig(settings), depsRef.current));
  const { events, add } = useEventLog(() => [resetEvent(initial)]);

  // Source of truth for transitions; `shown` trails it by the reveal delay.
  const trialRef = useRef<TrialState>(initial);
  const [shown, setShown] = useState<TrialState>(initial);
  const [revealing, setRevealing] = useState(false);
  const [upload, setUpload] = useState<UploadStatus>(client ? { state: 'idle' } : { state: 'disabled' });
  const timerRef = useRef<ReturnType<typeof setTimeout> | null>(null);
  const settingsRef = useRef(settings);
  settingsRef.current = settings;

  const clearTimer = () => {
    if (timerRef.current !== null) clearTimeout(timerRef.current);
    timerRef.current = null;
  };

  useEffect(() => clearTimer, []);

  const send = useCallback((rec: TrialRecord) => {
    if (!client) return;
    setUpload({ state: 'sending' });
    // A new game may start before the POST settles; its status belongs to that game.
    const current = () => trialRef.current.sessionId === rec.sessionId;
    void client.post(rec).then(
      () => { if (current()) setUpload({ state: 'sent' }); },
      (e: unknown) => {
        console.error('[records] upload failed', e);
        if (current()) setUpload({ state: 'failed', message: e instanceof Error ? e.message : String(e) });
      }
    );
  }, [client]);

  const dispatch = useCallback((action: TrialAction) => {
    const current = trialRef.current;
    const result = transition(current, action, depsRef.current);
    if (!result.ok) {
      console.warn(`[trial] rejected ${action.type}: ${result.error.reason}`);
      add('transition_rejected', current.sessionId, { action: action.type, reason: result.error.reason });
      return;
    }
    const next = result.state;
    trialRef.current = next;

    if (action.type === 'newGame') {
      clearTimer();
      setRevealing(false);
      setShown(next);
      setUpload(client ? { state: 'idle' } : { state: 'disabled' });
      console.info(`[trial] new session ${next.sessionId} (${next.config.boxCount} boxes)`);
      add('trial_reset', next.sessionId, { config: next.config });
      return;
    }
    if (action.type === 'openNext') {
      setShown(next);
      add('box_open', next.sessionId, { openedCount: next.openedCount });
      return;
    }

    add('trial_stop', next.sessionId, { openedCount: next.openedCount, outcome: next.outcome, payoff: next.payoff });
    send(exportRecord(next, settingsRef.current.participantId));
    if (revealDelayMs <= 0) {
      setShown(next);
      return;
    }
    setRevealing(true);
    timerRef.current = setTimeout(() => {
      timerRef.current = null;
      setRevealing(false);
      setShown(next);
    }, revealDelayMs);
  }, [add, client, revealDelayMs, send]);

  const value = useMemo<Ctx>(() => ({
    view: snapshot(shown),
    timing: { startedAt: shown.startedAt, revealedAt: shown.revealedAt },
    record: exportRecord(shown, settings.participantId),
    revealing,
    settings,
    events,
    upload,
    updateSettings: (patch) => {
      setSettings(prev => {
        const next = clampSettings({ ...prev, ...patch });
        writeSettings(next);
        return next;
      });
    },
    newGame: () => {
      const { boxCount, gridColumns, payoffPerBox } = settingsRef.current;
      dispatch({ type: 'newGame', config: { boxCount, gridColumns, payoffPerBox } });
    },
    openNext: () => dispatch({ type: 'openNext' }),
    stop: () => dispatch({ type: 'stop' }),
  }), [shown, revealing, settings, events, upload, dispatch]);

  return <TrialCtx.Provider value={value}>{children}</TrialCtx.Provider>;
}

export function useTrial() {
  const ctx = useContext(TrialCtx);
  if (!ctx) throw new Error('useTrial must be used within TrialProvider');
  return ctx;
}
