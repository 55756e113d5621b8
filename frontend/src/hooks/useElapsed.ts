import { useEffect, useState } from 'react';

/** Whole seconds from `startedAt` to `endedAt`, or to now while still running. */
export function useElapsed(startedAt: number, endedAt: number | null) {
  const [now, setNow] = useState(Date.now());

  useEffect(() => {
    if (endedAt !== null) return;
    const id = window.setInterval(() => setNow(Date.now()), 1000);
    return () => window.clearInterval(id);
  }, [endedAt]);

  const end = endedAt ?? now;
  return Math.max(0, Math.floor((end - startedAt) / 1000));
}
