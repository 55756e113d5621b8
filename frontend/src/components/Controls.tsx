import React from 'react';
import { canOpenNext, canStop, type RenderView } from '../engine/view';

// `revealing`: the trial is already stopped, only the outcome display is pending.
export default function Controls({
  view,
  revealing,
  onOpen,
  onStop,
}: {
  view: RenderView;
  revealing: boolean;
  onOpen: () => void;
  onStop: () => void;
}) {
  return (
    <div className="row controls">
      <button disabled={revealing || !canOpenNext(view)} onClick={onOpen}>
        📦 Open next box (#{view.openedCount + 1})
      </button>
      <button disabled={revealing || !canStop(view)} onClick={onStop}>
        🛑 Stop &amp; Reveal
      </button>
      <div className="rules">
        <strong>Rules</strong>
        <ul>
          <li>You must open boxes <strong>in order</strong> (1, 2, 3, …).</li>
          <li>Click <strong>Stop &amp; Reveal</strong> anytime to lock in your payoff.</li>
          <li>If the bomb is among the boxes you opened, your payoff is <strong>0</strong>.</li>
          <li>Otherwise, you earn: <code>opened_boxes × payoff_per_box</code>.</li>
        </ul>
      </div>
    </div>
  );
}
