export function extractFirstEmail(s?: string): string | undefined {
  if (!s) return undefined;
  const m = s.match(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i);
  return m ? m[0] : undefined;
}

export function cleanEmailLike(s?: string): string | undefined {
  if (!s) return undefined;
  // Handles forms like: <mailto:x@y|x@y>, <mailto:x@y>, <x@y>, Name <x@y>
  const email = extractFirstEmail(s);
  return email || s;
}

// Slack wraps links as <url|label> or <url>; keep the label (or the bare address)
export function unwrapSlackLinks(text: string): string {
  return text.replace(/<(?:mailto:)?([^<>|]+)(?:\|([^<>]+))?>/g, (_m, target: string, label?: string) => label ?? target);
}

// Counts code points so an emoji is never cut in half
export function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  const chars = Array.from(s);
  return chars.length > max ? chars.slice(0, max).join('') : s;
}
