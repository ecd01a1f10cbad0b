import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";
import type { Vocabulary, VocabularyEntry } from "./domain";

export const BUNDLED_VOCABULARY_PATH = new URL(
  "../data/commands.json",
  import.meta.url
);

const PRINTABLE_ASCII = /^[\x20-\x7e]+$/;

export const vocabularySchema = z
  .object({
    name: z.string().min(1).optional(),
    identifiers: z.array(
      z
        .string()
        .min(1, "identifier must not be empty")
        .regex(PRINTABLE_ASCII, "identifier must be printable ASCII")
    ),
    descriptions: z.array(z.string()),
  })
  .refine((v) => v.identifiers.length === v.descriptions.length, {
    message: "identifiers and descriptions must have the same length",
    path: ["descriptions"],
  });

export class VocabularyError extends Error {
  readonly source: string;
  readonly issues: z.ZodIssue[];

  constructor(source: string, message: string, issues: z.ZodIssue[] = []) {
    super(`${source}: ${message}`);
    this.name = "VocabularyError";
    this.source = source;
    this.issues = issues;
  }
}

/**
 * Validates raw (already JSON-parsed) data as a vocabulary.
 * @throws VocabularyError listing every issue zod found
 */
export function parseVocabulary(raw: unknown, source = "vocabulary"): Vocabulary {
  const parsed = vocabularySchema.safeParse(raw);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new VocabularyError(source, summary, parsed.error.issues);
  }
  const { name, identifiers, descriptions } = parsed.data;
  return { name: name ?? source, identifiers, descriptions };
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new VocabularyError(source, `invalid JSON (${reason})`);
  }
}

export async function loadVocabularyFile(path: string): Promise<Vocabulary> {
  const text = await readFile(path, "utf8");
  return parseVocabulary(parseJson(text, path), basename(path, ".json"));
}

let bundled: Vocabulary | null = null;

/** The vehicle-control command vocabulary shipped with the package. */
export function bundledVocabulary(): Vocabulary {
  if (!bundled) {
    const text = readFileSync(BUNDLED_VOCABULARY_PATH, "utf8");
    bundled = parseVocabulary(parseJson(text, "commands.json"));
  }
  return bundled;
}

/** Concatenates vocabularies in order, keeping the index alignment. */
export function mergeVocabularies(vocabularies: readonly Vocabulary[]): Vocabulary {
  if (vocabularies.length === 1) return vocabularies[0];
  return {
    name: vocabularies.map((v) => v.name).join("+"),
    identifiers: vocabularies.flatMap((v) => v.identifiers),
    descriptions: vocabularies.flatMap((v) => v.descriptions),
  };
}

export function vocabularyEntries(vocabulary: Vocabulary): VocabularyEntry[] {
  return vocabulary.identifiers.map((identifier, index) => ({
    index,
    identifier,
    description: vocabulary.descriptions[index],
  }));
}
