import { describe, it, expect } from 'vitest';
import { describeStatus } from './StatusLine';
import { reset, openNext, stop, type TrialState } from '../engine/trial';
import { snapshot } from '../engine/view';

function played(bomb: number, opened: number): TrialState {
  let s: TrialState = reset({ boxCount: 10, gridColumns: 10, payoffPerBox: 10 }, { random: () => (bomb - 0.5) / 10 });
  for (let i = 0; i < opened; i++) s = openNext(s);
  return s;
}

describe('describeStatus', () => {
  it('counts opened boxes before reveal', () => {
    expect(describeStatus(snapshot(played(5, 3)))).toBe('Boxes opened: 3 / 10');
  });

  it('reports a bombed stop', () => {
    expect(describeStatus(snapshot(stop(played(5, 5))))).toBe('💥 Bomb was in box 5 → Payoff: 0');
  });

  it('reports a safe stop with the payoff breakdown', () => {
    expect(describeStatus(snapshot(stop(played(5, 4))))).toBe('✅ Safe! Bomb was in box 5 → Payoff: 40 (4 × 10)');
  });
});
