export function fmtTime(sec: number) {
  const m = Math.floor(sec / 60), s = sec % 60;
  return `${String(m).padStart(2,'0')}:${String(s).padStart(2,'0')}`;
}

const pad2 = (n: number) => String(n).padStart(2, '0');

// YYYYMMDD-HHMMSS in UTC.
export function fmtRunStamp(d: Date) {
  return `${d.getUTCFullYear()}${pad2(d.getUTCMonth() + 1)}${pad2(d.getUTCDate())}`
    + `-${pad2(d.getUTCHours())}${pad2(d.getUTCMinutes())}${pad2(d.getUTCSeconds())}`;
}

export function isoOrNull(ms: number | null) {
  return ms === null ? null : new Date(ms).toISOString();
}
