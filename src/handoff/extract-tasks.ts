/**
 * Warden Task Extraction
 * Best-effort split of free text into task items
 */

const NUMBERED_ITEM = /^\s*\d+[.)]?\s+(.+?)\s*$/gm;
const BULLET_ITEM = /^\s*[-*•]\s+(.+?)\s*$/gm;
const DELIMITERS = ['\n', ';'] as const;

function captures(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), match => match[1] ?? '').filter(item => item.length > 0);
}

/**
 * Numbered lines win over bullets, bullets over line/semicolon splitting.
 * Anything else is returned as a single task. Commas are not split on:
 * "fix a, b and c" is one task.
 */
export function extractTasks(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];

  const numbered = captures(trimmed, NUMBERED_ITEM);
  if (numbered.length > 0) return numbered;

  const bulleted = captures(trimmed, BULLET_ITEM);
  if (bulleted.length > 0) return bulleted;

  for (const delimiter of DELIMITERS) {
    if (trimmed.includes(delimiter)) {
      return trimmed.split(delimiter).map(part => part.trim()).filter(Boolean);
    }
  }

  return [trimmed];
}

export function toTaskList(value: string | readonly string[] | undefined): string[] {
  if (value === undefined) return [];
  if (typeof value === 'string') return extractTasks(value);
  return value.map(item => item.trim()).filter(Boolean);
}
