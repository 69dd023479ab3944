export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Sleep = (ms: number) => Promise<void>;

// Counts code points so a surrogate pair is never split
export function truncate(input: string, max: number): string {
  const chars = Array.from(input);
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : input;
}

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

export function absoluteUrl(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

// "t31" from ".../t31-some-title"
export function extractThreadId(url: string): string | null {
  const match = /\/t(\d+)-/.exec(url);
  return match ? `t${match[1]}` : null;
}

export function uniqueById<T extends { id: string }>(items: T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    out.push(item);
  }
  return out;
}
