import React from 'react';
import type { RenderView } from '../engine/view';
import { fmtTime } from '../utils/time';

export function describeStatus(view: RenderView): string {
  if (!view.revealed) return `Boxes opened: ${view.openedCount} / ${view.boxCount}`;
  if (view.outcome === 'bombed') return `💥 Bomb was in box ${view.bombIndex} → Payoff: 0`;
  return `✅ Safe! Bomb was in box ${view.bombIndex} → Payoff: ${view.payoff} (${view.openedCount} × ${view.payoffPerBox})`;
}

export default function StatusLine({
  view,
  revealing,
  elapsedSec,
}: {
  view: RenderView;
  revealing: boolean;
  elapsedSec: number;
}) {
  return (
    <div className="toolbar">
      <h3 className={`status ${view.revealed ? view.outcome : ''}`} role="status">
        {revealing ? 'Revealing…' : describeStatus(view)}
      </h3>
      <div className="spacer" />
      <div className="timer">{fmtTime(elapsedSec)}</div>
    </div>
  );
}
