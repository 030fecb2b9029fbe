import fs from "node:fs";
import { z } from "zod";
import type { DictionaryEntityType } from "./types.js";

const termDictionarySchema = z.record(z.string(), z.array(z.string().min(1)).min(1));

const terminologySchema = z.object({
  person_type: termDictionarySchema,
  program: termDictionarySchema,
  jurisdiction: termDictionarySchema,
  requirement: termDictionarySchema
});

const synonymsSchema = z.record(z.string(), z.array(z.string().min(1)));

const stopWordsSchema = z.object({
  english: z.array(z.string()),
  french: z.array(z.string())
});

export type TermDictionary = Record<string, string[]>;
export type Terminology = Record<DictionaryEntityType, TermDictionary>;
export type SynonymDictionary = Record<string, string[]>;

export interface StopWords {
  english: ReadonlySet<string>;
  french: ReadonlySet<string>;
}

const readDataFile = <T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T => {
  const fileUrl = new URL(`./data/${fileName}`, import.meta.url);
  const parsed = schema.safeParse(JSON.parse(fs.readFileSync(fileUrl, "utf8")));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid analysis data file ${fileName}: ${details}`);
  }
  return parsed.data;
};

let terminologyCache: Terminology | null = null;
let synonymsCache: SynonymDictionary | null = null;
let stopWordsCache: StopWords | null = null;

export const loadTerminology = (): Terminology => {
  if (!terminologyCache) {
    terminologyCache = readDataFile("legal-terminology.json", terminologySchema);
  }
  return terminologyCache;
};

export const loadSynonyms = (): SynonymDictionary => {
  if (!synonymsCache) {
    synonymsCache = readDataFile("legal-synonyms.json", synonymsSchema);
  }
  return synonymsCache;
};

export const loadStopWords = (): StopWords => {
  if (!stopWordsCache) {
    const raw = readDataFile("stop-words.json", stopWordsSchema);
    stopWordsCache = {
      english: new Set(raw.english),
      french: new Set(raw.french)
    };
  }
  return stopWordsCache;
};

/** English and French stop words together, for building backend text queries. */
export const loadSearchStopWords = (): ReadonlySet<string> => {
  const { english, french } = loadStopWords();
  return new Set([...english, ...french]);
};

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
