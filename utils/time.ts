const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function pad(n: number): string { return n < 10 ? '0' + n : String(n); }

function stamp(y: number, mo: number, d: number, h: number, mi: number): string {
  return `${y}-${pad(mo)}-${pad(d)} ${pad(h)}:${pad(mi)}`;
}

function localStamp(date: Date): string {
  return stamp(date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes());
}

// "Fri, 06 Feb 2026 12:00:00 +0000": keeps the sender's wall clock, offset ignored
function parseRfc2822(raw: string): string | null {
  const m = raw.match(/^\s*(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})[a-z]*\s+(\d{2,4})\s+(\d{1,2}):(\d{2})(?::\d{2})?/);
  if (!m) return null;
  const month = MONTHS[m[2].toLowerCase()];
  if (!month) return null;
  let year = Number(m[3]);
  if (m[3].length === 2) year += year < 50 ? 2000 : 1900;
  const hour = Number(m[4]);
  const minute = Number(m[5]);
  const day = Number(m[1]);
  if (day < 1 || day > 31 || hour > 23 || minute > 59) return null;
  return stamp(year, month, day, hour, minute);
}

function parseEpochMillis(raw: string | number): string | null {
  const ms = typeof raw === 'number' ? raw : /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
  if (!Number.isFinite(ms)) return null;
  const d = new Date(ms);
  return Number.isNaN(d.getTime()) ? null : localStamp(d);
}

function parseIso(raw: string): string | null {
  if (!/^\d{4}-\d{2}-\d{2}/.test(raw.trim())) return null;
  const d = new Date(raw.trim());
  return Number.isNaN(d.getTime()) ? null : localStamp(d);
}

/**
 * Renders a mail timestamp as "YYYY-MM-DD HH:mm". Tries RFC 2822, epoch
 * milliseconds and ISO 8601 in that order; anything else comes back unchanged.
 */
export function formatTime(raw: string | number | null | undefined): string {
  if (raw === null || raw === undefined || raw === '') return '';
  if (typeof raw === 'number') return parseEpochMillis(raw) ?? String(raw);
  const attempts: Array<() => string | null> = [
    () => parseRfc2822(raw),
    () => parseEpochMillis(raw),
    () => parseIso(raw),
  ];
  for (const attempt of attempts) {
    const out = attempt();
    if (out) return out;
  }
  return raw;
}

export function formatNow(now: Date = new Date()): string {
  return localStamp(now);
}
