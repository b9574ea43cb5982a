const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F�]/g;
const ARTIFACT_TOKEN = /(^|[ \t])[~`]+(?=[ \t]|$)/g;
const HYPHENATED_BREAK = /(\p{Ll})-\n(\p{Ll})/gu;
const COLUMN_GAP = /\S {2,}(?=\S)/g;
const NUMERIC_TOKEN = /\d+(?:[.,:/-]\d+)*/g;

const countColumnGaps = (line: string) => (line.match(COLUMN_GAP) ?? []).length;

/** Lines that look like table rows on their own keep their internal spacing. */
export function isTabularLine(line: string): boolean {
  if (line.includes('\t') || line.includes('|')) return true;
  return countColumnGaps(line) >= 2;
}

// A single wide gap counts as a column only when an adjacent line has one too
// (two-column lists such as receipts and price lists).
function findTabularLines(lines: string[]): boolean[] {
  const gaps = lines.map(countColumnGaps);
  return lines.map(
    (line, index) =>
      isTabularLine(line) || (gaps[index] >= 1 && ((gaps[index - 1] ?? 0) >= 1 || (gaps[index + 1] ?? 0) >= 1)),
  );
}

/**
 * Deterministic OCR cleanup. Only whitespace, control characters and stray
 * `~`/backtick tokens are touched, so digits and punctuation inside numbers
 * and dates come through byte-identical.
 */
export function cleanupOcrText(text: string): string {
  const normalized = text
    .replace(/\r\n?/g, '\n')
    .replace(CONTROL_CHARS, '')
    .replace(HYPHENATED_BREAK, '$1$2');

  const rawLines = normalized.split('\n');
  const tabular = findTabularLines(rawLines);
  const lines = rawLines.map((rawLine, index) => {
    const line = rawLine.replace(ARTIFACT_TOKEN, '$1').trimEnd();
    if (tabular[index]) return line;
    return line.replace(/[ \t]+/g, ' ').trim();
  });

  return lines
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function extractNumericTokens(text: string): string[] {
  return text.match(NUMERIC_TOKEN) ?? [];
}

/** True when every numeric token of `original` survives in `candidate` (as a multiset). */
export function preservesNumericTokens(original: string, candidate: string): boolean {
  const available = new Map<string, number>();
  for (const token of extractNumericTokens(candidate)) {
    available.set(token, (available.get(token) ?? 0) + 1);
  }

  for (const token of extractNumericTokens(original)) {
    const count = available.get(token) ?? 0;
    if (count === 0) return false;
    available.set(token, count - 1);
  }
  return true;
}
