import { z } from 'zod';
import { InvalidConfig } from './errors';

export const MIN_BOX_COUNT = 10;

export const TrialConfigSchema = z.object({
  boxCount: z.number().int().min(MIN_BOX_COUNT),
  gridColumns: z.number().int().min(5).max(20),
  payoffPerBox: z.number().positive().finite()
});

export type TrialConfig = Readonly<z.infer<typeof TrialConfigSchema>>;

export function parseTrialConfig(input: unknown): TrialConfig {
  const parsed = TrialConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfig('config out of range', { issues: parsed.error.flatten().fieldErrors });
  }
  return Object.freeze(parsed.data);
}

// Ranges offered by the settings panel; narrower than what the engine accepts.
export const SETTINGS_LIMITS = {
  payoffPerBox: { min: 1, step: 1 },
  boxCount: { min: 10, max: 200, step: 10 },
  gridColumns: { min: 5, max: 20, step: 1 }
} as const;

export const DEFAULT_SETTINGS = {
  payoffPerBox: 10,
  boxCount: 100,
  gridColumns: 10
} as const;

export type Settings = {
  payoffPerBox: number;
  boxCount: number;
  gridColumns: number;
  participantId: string;
};

function clampInt(v: number, min: number, max: number, fallback: number) {
  if (!Number.isFinite(v)) return fallback;
  return Math.min(max, Math.max(min, Math.round(v)));
}

export function clampSettings(s: Settings): Settings {
  const { payoffPerBox, boxCount, gridColumns } = SETTINGS_LIMITS;
  return {
    payoffPerBox: Number.isFinite(s.payoffPerBox)
      ? Math.max(payoffPerBox.min, s.payoffPerBox)
      : DEFAULT_SETTINGS.payoffPerBox,
    boxCount: clampInt(s.boxCount, boxCount.min, boxCount.max, DEFAULT_SETTINGS.boxCount),
    gridColumns: clampInt(s.gridColumns, gridColumns.min, gridColumns.max, DEFAULT_SETTINGS.gridColumns),
    participantId: s.participantId
  };
}

export function settingsToConfig(s: Settings): TrialConfig {
  return parseTrialConfig({ boxCount: s.boxCount, gridColumns: s.gridColumns, payoffPerBox: s.payoffPerBox });
}
