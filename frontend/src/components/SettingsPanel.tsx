import React, { useEffect, useState } from 'react';
import { SETTINGS_LIMITS, type Settings } from '../engine/config';

function NumberField({
  label,
  value,
  min,
  max,
  step,
  onCommit,
}: {
  label: string;
  value: number;
  min: number;
  max?: number;
  step: number;
  onCommit: (v: number) => void;
}) {
  const [draft, setDraft] = useState(String(value));
  useEffect(() => setDraft(String(value)), [value]);

  // Clamping happens on commit so intermediate keystrokes aren't rewritten.
  const commit = () => {
    const n = Number(draft);
    if (draft.trim() === '' || Number.isNaN(n)) {
      setDraft(String(value));
      return;
    }
    onCommit(n);
  };

  return (
    <label>{label}
      <input
        type="number"
        min={min}
        max={max}
        step={step}
        value={draft}
        onChange={(e) => setDraft(e.target.value)}
        onBlur={commit}
        onKeyDown={(e) => { if (e.key === 'Enter') commit(); }}
      />
    </label>
  );
}

export default function SettingsPanel({
  settings,
  sessionId,
  onChange,
  onNewGame,
}: {
  settings: Settings;
  sessionId: string;
  onChange: (patch: Partial<Settings>) => void;
  onNewGame: () => void;
}) {
  const { payoffPerBox, boxCount, gridColumns } = SETTINGS_LIMITS;
  return (
    <aside className="card sidebar">
      <h3>Settings</h3>
      <NumberField label="Payoff per safe box" value={settings.payoffPerBox} min={payoffPerBox.min} step={payoffPerBox.step}
        onCommit={(v) => onChange({ payoffPerBox: v })} />
      <NumberField label="Total boxes" value={settings.boxCount} min={boxCount.min} max={boxCount.max} step={boxCount.step}
        onCommit={(v) => onChange({ boxCount: v })} />
      <NumberField label="Grid columns" value={settings.gridColumns} min={gridColumns.min} max={gridColumns.max} step={gridColumns.step}
        onCommit={(v) => onChange({ gridColumns: v })} />
      <label>Participant ID (optional)
        <input value={settings.participantId} onChange={(e) => onChange({ participantId: e.target.value })} />
      </label>
      <p className="hint">Changes apply from the next game.</p>
      <div className="row">
        <button onClick={onNewGame}>🔁 New Participant / New Game</button>
        <span>Run ID: <code>{sessionId}</code></span>
      </div>
    </aside>
  );
}
