// Tab-scoped: nothing survives closing the tab.
export const storage = {
  set<T>(k: string, v: T) { sessionStorage.setItem(k, JSON.stringify(v)); },
  get(k: string): unknown { const r = sessionStorage.getItem(k); return r ? JSON.parse(r) : null; }
};
