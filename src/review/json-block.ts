export interface JsonBlock {
  value: unknown;
  /** True when the block was cut off and had to be closed to parse. */
  repaired: boolean;
}

type Accept = (value: unknown) => boolean;

const MAX_START_POSITIONS = 50;
const MAX_REPAIR_ATTEMPTS = 100;

const CLOSERS: Record<string, string> = { "{": "}", "[": "]" };

interface ScanResult {
  /** Index one past the closing bracket, or -1 when the input ran out first. */
  end: number;
  /** Cut points after complete nested values, with the brackets still open there. */
  cuts: Array<{ index: number; closers: string }>;
}

function scan(text: string, start: number): ScanResult | null {
  const stack: string[] = [];
  const cuts: ScanResult["cuts"] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      stack.push(CLOSERS[ch] ?? "");
    } else if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) return null;
      if (stack.length === 0) return { end: i + 1, cuts };
      cuts.push({ index: i + 1, closers: [...stack].reverse().join("") });
    }
  }

  return { end: -1, cuts };
}

function tryParse(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

function repair(text: string, start: number, cuts: ScanResult["cuts"], accept: Accept): unknown {
  const attempts = cuts.slice(-MAX_REPAIR_ATTEMPTS).reverse();
  for (const cut of attempts) {
    const parsed = tryParse(text.slice(start, cut.index) + cut.closers);
    if (parsed.ok && accept(parsed.value)) return parsed.value;
  }
  return undefined;
}

function findInRegion(region: string, accept: Accept): JsonBlock | null {
  const direct = tryParse(region.trim());
  if (direct.ok && accept(direct.value)) {
    return { value: direct.value, repaired: false };
  }

  let starts = 0;
  for (let i = 0; i < region.length && starts < MAX_START_POSITIONS; i++) {
    const ch = region.charAt(i);
    if (ch !== "{" && ch !== "[") continue;
    starts++;

    const result = scan(region, i);
    if (!result) continue;

    if (result.end !== -1) {
      const parsed = tryParse(region.slice(i, result.end));
      if (parsed.ok && accept(parsed.value)) {
        return { value: parsed.value, repaired: false };
      }
      continue;
    }

    const repaired = repair(region, i, result.cuts, accept);
    if (repaired !== undefined) {
      return { value: repaired, repaired: true };
    }
  }

  return null;
}

const FENCE = /```[a-zA-Z0-9_-]*[ \t]*\r?\n([\s\S]*?)(?:```|$)/g;

/**
 * Locates the first JSON value in free-form model output that `accept`
 * recognises. Fenced blocks are tried before the surrounding text; a block cut
 * off mid-way is closed after its last complete element.
 */
export function findJsonBlock(text: string, accept: Accept = () => true): JsonBlock | null {
  for (const match of text.matchAll(FENCE)) {
    const body = match[1];
    if (!body) continue;
    const found = findInRegion(body, accept);
    if (found) return found;
  }
  return findInRegion(text, accept);
}
