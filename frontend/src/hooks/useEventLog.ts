import { useCallback, useMemo, useState } from 'react';
import type { EventRecord, TrialEventType } from '../types';

export function useEventLog(initial: () => EventRecord[] = () => []) {
  const [events, setEvents] = useState<EventRecord[]>(initial);

  const add = useCallback((type: TrialEventType, sessionId: string, payload?: Record<string, unknown>) => {
    setEvents(prev => [...prev, { t: Date.now(), type, sessionId, payload }]);
  }, []);

  return useMemo(() => ({ events, add }), [events, add]);
}
