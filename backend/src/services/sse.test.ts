import { describe, it, expect } from 'vitest';
import { SseHub } from './sse.js';

function sink() {
  const chunks: string[] = [];
  return { chunks, write: (c: string) => chunks.push(c) };
}

describe('SseHub', () => {
  it('broadcasts framed events to every client', () => {
    const hub = new SseHub<{ n: number }>();
    const a = sink();
    const b = sink();
    hub.addClient(a);
    hub.addClient(b);
    hub.broadcast('record', { n: 1 });
    expect(a.chunks).toEqual(['event: record\ndata: {"n":1}\n\n']);
    expect(b.chunks).toEqual(a.chunks);
  });

  it('stops writing to removed clients', () => {
    const hub = new SseHub<number>();
    const a = sink();
    const id = hub.addClient(a);
    hub.removeClient(id);
    hub.broadcast('record', 1);
    expect(a.chunks).toEqual([]);
    expect(hub.size).toBe(0);
  });
});
