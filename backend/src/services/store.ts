import type { TrialRecord } from '../types/record.js';

type Ring<T> = {
  push: (item: T) => void;
  all: () => T[];
  latest: () => T | null;
};

function createRing<T>(capacity: number): Ring<T> {
  const data: T[] = [];
  return {
    push(item: T) {
      if (data.length >= capacity) data.shift();
      data.push(item);
    },
    all() {
      return data.slice().reverse();
    },
    latest() {
      return data.length ? data[data.length - 1] : null;
    }
  };
}

function evictOldest<K, V>(map: Map<K, V>, max: number) {
  while (map.size > max) {
    const oldest = map.keys().next();
    if (oldest.done) return;
    map.delete(oldest.value);
  }
}

// Sessions and participants are both kept for the last `capacity` records only;
// duplicate detection (`has`) covers that window.
export class RecordStore {
  private global: Ring<TrialRecord>;
  private perParticipant = new Map<string, Ring<TrialRecord>>();
  private bySession = new Map<string, TrialRecord>();

  constructor(private capacity = 1000) {
    this.global = createRing<TrialRecord>(capacity);
  }

  add(rec: TrialRecord) {
    this.global.push(rec);
    this.bySession.set(rec.sessionId, rec);
    evictOldest(this.bySession, this.capacity);
    if (rec.participantId) {
      let ring = this.perParticipant.get(rec.participantId);
      if (ring) {
        // re-insert so the most recently active participant is evicted last
        this.perParticipant.delete(rec.participantId);
      } else {
        ring = createRing<TrialRecord>(Math.max(1, Math.floor(this.capacity / 2)));
      }
      this.perParticipant.set(rec.participantId, ring);
      ring.push(rec);
      evictOldest(this.perParticipant, this.capacity);
    }
  }

  get participantCount() {
    return this.perParticipant.size;
  }

  has(sessionId: string) {
    return this.bySession.has(sessionId);
  }

  get(sessionId: string): TrialRecord | null {
    return this.bySession.get(sessionId) ?? null;
  }

  latest(participantId?: string): TrialRecord | null {
    if (participantId) return this.perParticipant.get(participantId)?.latest() ?? null;
    return this.global.latest();
  }

  history(participantId?: string, limit = 100): TrialRecord[] {
    const list = participantId ? this.perParticipant.get(participantId)?.all() ?? [] : this.global.all();
    return list.slice(0, limit);
  }
}
