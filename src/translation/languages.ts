import { readFileSync } from 'node:fs';
import { z } from 'zod';

const LANGUAGE_TABLE_SCHEMA = z.array(
  z.object({
    code: z.string().min(2),
    name: z.string().min(1),
    aliases: z.array(z.string()).default([]),
  }),
);

export type LanguageEntry = z.infer<typeof LANGUAGE_TABLE_SCHEMA>[number];

export const AUTO_LANGUAGE = 'auto';

const LANGUAGE_TABLE_URL = new URL('../../data/languages.json', import.meta.url);

// Short aliases (ISO-639-2 codes like "est") would match inside unrelated words.
const MIN_SUBSTRING_ALIAS_LENGTH = 4;
const MIN_SUBSTRING_INPUT_LENGTH = 3;

export function loadLanguageTable(url: URL = LANGUAGE_TABLE_URL): LanguageEntry[] {
  const raw = readFileSync(url, 'utf8');
  const res = LANGUAGE_TABLE_SCHEMA.safeParse(JSON.parse(raw));
  if (!res.success) {
    throw new Error(`Invalid language table at ${url.pathname}: ${res.error.message}`);
  }
  return res.data;
}

export type LanguageDirectory = {
  entries: LanguageEntry[];
  /** Name, alias or code → code. Unknown identifiers pass through (lower-cased) as a best-effort code. */
  resolveCode: (language: string) => string;
  /** Code → display name; unknown codes come back upper-cased. */
  getName: (code: string) => string;
  isKnownCode: (code: string) => boolean;
};

export function createLanguageDirectory(entries: LanguageEntry[]): LanguageDirectory {
  const codes = new Map<string, LanguageEntry>();
  const names = new Map<string, string>();

  for (const entry of entries) {
    const code = entry.code.toLowerCase();
    codes.set(code, entry);
    names.set(entry.name.toLowerCase(), code);
    for (const alias of entry.aliases) {
      names.set(alias.toLowerCase(), code);
    }
  }

  const substringCandidates = Array.from(names.entries()).filter(
    ([alias]) => alias.length >= MIN_SUBSTRING_ALIAS_LENGTH,
  );

  const resolveCode = (language: string): string => {
    const normalized = language.trim().toLowerCase();
    if (!normalized || normalized === AUTO_LANGUAGE) return normalized;

    if (codes.has(normalized)) return normalized;

    const exact = names.get(normalized);
    if (exact) return exact;

    if (normalized.length >= MIN_SUBSTRING_INPUT_LENGTH) {
      for (const [alias, code] of substringCandidates) {
        if (alias.includes(normalized) || normalized.includes(alias)) {
          return code;
        }
      }
    }

    return normalized;
  };

  const getName = (code: string): string => {
    const normalized = code.trim().toLowerCase();
    const entry = codes.get(normalized);
    if (entry) return entry.name;
    return normalized.toUpperCase();
  };

  return {
    entries,
    resolveCode,
    getName,
    isKnownCode: (code) => codes.has(code.trim().toLowerCase()),
  };
}

let defaultDirectory: LanguageDirectory | null = null;

export function getLanguageDirectory(): LanguageDirectory {
  if (!defaultDirectory) {
    defaultDirectory = createLanguageDirectory(loadLanguageTable());
  }
  return defaultDirectory;
}
