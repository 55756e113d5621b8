export type TrialEventType = 'trial_reset' | 'box_open' | 'trial_stop' | 'transition_rejected';

export interface EventRecord {
  t: number;
  type: TrialEventType;
  sessionId: string;
  payload?: Record<string, unknown>;
}

export type UploadStatus =
  | { state: 'disabled' }
  | { state: 'idle' }
  | { state: 'sending' }
  | { state: 'sent' }
  | { state: 'failed'; message: string };
