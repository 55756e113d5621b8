// @vitest-environment jsdom
import React from 'react';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { render, screen, fireEvent, cleanup, act } from '@testing-library/react';
import { MemoryRouter } from 'react-router-dom';
import Task from './Task';
import { TrialProvider } from '../hooks/useTrial';
import type { RecordsClient } from '../services/records';

// Default settings: 100 boxes at 10 per box. 0.455 puts the bomb in box 46.
const deps = { random: () => 0.455, now: () => 0, createSessionId: () => 'S-1' };

function renderTask(opts: { client?: RecordsClient | null; revealDelayMs?: number; deps?: typeof deps } = {}) {
  return render(
    <MemoryRouter>
      <TrialProvider deps={opts.deps ?? deps} client={opts.client ?? null} revealDelayMs={opts.revealDelayMs ?? 0}>
        <Task />
      </TrialProvider>
    </MemoryRouter>
  );
}

function numberedSessions() {
  let n = 0;
  return { ...deps, createSessionId: () => `S-${++n}` };
}

const openButton = () => screen.getByRole('button', { name: /Open next box/ });
const stopButton = () => screen.getByRole('button', { name: /Stop & Reveal/ });
const status = () => screen.getByRole('status').textContent;

beforeEach(() => sessionStorage.clear());
afterEach(() => {
  cleanup();
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('Task page', () => {
  it('starts with nothing opened and stop disabled', () => {
    renderTask();
    expect(status()).toBe('Boxes opened: 0 / 100');
    expect(stopButton()).toHaveProperty('disabled', true);
    expect(openButton()).toHaveProperty('disabled', false);
    expect(screen.getAllByRole('button', { name: /^Box \d+: closed$/ })).toHaveLength(100);
  });

  it('opens boxes in order without revealing the bomb', () => {
    renderTask();
    for (let i = 0; i < 50; i++) fireEvent.click(openButton());
    expect(status()).toBe('Boxes opened: 50 / 100');
    expect(screen.getByRole('button', { name: 'Box 46: opened' })).toBeTruthy();
    expect(screen.queryAllByRole('button', { name: /: bomb$/ })).toHaveLength(0);
    expect(openButton().textContent).toBe('📦 Open next box (#51)');
  });

  it('reveals a safe outcome and locks the controls', () => {
    renderTask();
    for (let i = 0; i < 4; i++) fireEvent.click(openButton());
    fireEvent.click(stopButton());
    expect(status()).toBe('✅ Safe! Bomb was in box 46 → Payoff: 40 (4 × 10)');
    expect(screen.getByRole('button', { name: 'Box 46: bomb' })).toBeTruthy();
    expect(screen.getByRole('button', { name: 'Box 4: opened-safe' })).toBeTruthy();
    expect(openButton()).toHaveProperty('disabled', true);
    expect(stopButton()).toHaveProperty('disabled', true);
  });

  it('locks both controls during the reveal delay', () => {
    vi.useFakeTimers();
    renderTask({ revealDelayMs: 300 });
    fireEvent.click(openButton());
    fireEvent.click(stopButton());
    expect(status()).toBe('Revealing…');
    expect(openButton()).toHaveProperty('disabled', true);
    expect(stopButton()).toHaveProperty('disabled', true);

    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    fireEvent.click(openButton());
    fireEvent.click(stopButton());
    expect(warn).not.toHaveBeenCalled();

    act(() => { vi.advanceTimersByTime(300); });
    expect(status()).toBe('✅ Safe! Bomb was in box 46 → Payoff: 10 (1 × 10)');
    expect(openButton()).toHaveProperty('disabled', true);
    expect(stopButton()).toHaveProperty('disabled', true);
  });

  it('starts a new game with the committed settings', () => {
    renderTask();
    fireEvent.click(openButton());
    const boxes = screen.getByLabelText('Total boxes');
    fireEvent.change(boxes, { target: { value: '20' } });
    fireEvent.blur(boxes);
    expect(status()).toBe('Boxes opened: 1 / 100');

    fireEvent.click(screen.getByRole('button', { name: /New Game/ }));
    expect(status()).toBe('Boxes opened: 0 / 20');
    expect(screen.getAllByRole('button', { name: /^Box \d+: / })).toHaveLength(20);
  });

  it('restores settings stored earlier in the tab', () => {
    sessionStorage.setItem('bret.settings', JSON.stringify({ boxCount: 30, gridColumns: 6 }));
    renderTask();
    expect(status()).toBe('Boxes opened: 0 / 30');
    expect(screen.getAllByRole('button', { name: /^Box \d+: / })).toHaveLength(30);
  });

  it('clamps settings to the panel ranges', () => {
    renderTask();
    const boxes = screen.getByLabelText('Total boxes');
    fireEvent.change(boxes, { target: { value: '5000' } });
    fireEvent.blur(boxes);
    expect(boxes).toHaveProperty('value', '200');
  });

  it('keeps the participant label as typed, spaces included', () => {
    renderTask();
    const field = screen.getByLabelText('Participant ID (optional)');
    fireEvent.change(field, { target: { value: 'Jane ' } });
    expect(field).toHaveProperty('value', 'Jane ');
    fireEvent.change(field, { target: { value: 'Jane D' } });
    expect(field).toHaveProperty('value', 'Jane D');
  });

  it('does not report an earlier upload on a new game', async () => {
    let settle: () => void = () => {};
    const post = vi.fn(() => new Promise<void>((resolve) => { settle = resolve; }));
    const client: RecordsClient = { post, history: vi.fn(async () => []) };
    renderTask({ client, deps: numberedSessions() });
    fireEvent.click(openButton());
    fireEvent.click(stopButton());
    expect(screen.getByText('Uploading record…')).toBeTruthy();

    fireEvent.click(screen.getByRole('button', { name: /New Game/ }));
    expect(screen.getByText('Record is uploaded after reveal.')).toBeTruthy();

    await act(async () => { settle(); });
    expect(post).toHaveBeenCalledTimes(1);
    expect(screen.queryByText('Record uploaded.')).toBeNull();
    expect(screen.getByText('Record is uploaded after reveal.')).toBeTruthy();
  });

  it('does not report an earlier upload failure on a new game', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    let fail: (e: Error) => void = () => {};
    const post = vi.fn(() => new Promise<void>((_resolve, reject) => { fail = reject; }));
    const client: RecordsClient = { post, history: vi.fn(async () => []) };
    renderTask({ client, deps: numberedSessions() });
    fireEvent.click(openButton());
    fireEvent.click(stopButton());
    fireEvent.click(screen.getByRole('button', { name: /New Game/ }));

    await act(async () => { fail(new Error('offline')); });
    expect(screen.queryByText('Upload failed: offline')).toBeNull();
    expect(screen.getByText('Record is uploaded after reveal.')).toBeTruthy();
  });

  it('uploads the record once revealed', async () => {
    const post = vi.fn(async () => {});
    const client: RecordsClient = { post, history: vi.fn(async () => []) };
    renderTask({ client });
    for (let i = 0; i < 46; i++) fireEvent.click(openButton());
    fireEvent.click(stopButton());

    expect(await screen.findByText('Record uploaded.')).toBeTruthy();
    expect(post).toHaveBeenCalledTimes(1);
    expect(post).toHaveBeenCalledWith(expect.objectContaining({
      sessionId: 'S-1',
      openedCount: 46,
      bombIndex: 46,
      outcome: 'bombed',
      payoff: 0,
      participantId: null,
    }));
  });
});
