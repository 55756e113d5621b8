import React from 'react';
import { cellLabel, type CellLabel, type RenderView } from '../engine/view';

export const GLYPHS: Record<CellLabel, string> = {
  closed: '◻️',
  opened: '🟩',
  'opened-safe': '🟩',
  bomb: '💣',
};

// Display only: boxes are opened through the controls, in order.
export default function BoxGrid({ view }: { view: RenderView }) {
  const rows = Math.ceil(view.boxCount / view.gridColumns);
  return (
    <div className="grid">
      {Array.from({ length: rows }, (_, r) => (
        <div key={r} className="row grid-row">
          {Array.from({ length: view.gridColumns }, (_, c) => {
            const i = r * view.gridColumns + c + 1;
            if (i > view.boxCount) return null;
            const label = cellLabel(view, i);
            return (
              <button key={i} className={`cell ${label}`} data-label={label} aria-label={`Box ${i}: ${label}`} disabled>
                {GLYPHS[label]} {i}
              </button>
            );
          })}
        </div>
      ))}
    </div>
  );
}
