import fg from "fast-glob";
import {
  VocabularyError,
  bundledVocabulary,
  loadVocabularyFile,
  mergeVocabularies,
  type Vocabulary,
} from "@bitfit/vocabulary";

/**
 * Loads every file matching the glob, in sorted path order, as one
 * vocabulary. No pattern means the bundled vocabulary.
 */
export async function resolveVocabulary(pattern: string | null): Promise<Vocabulary> {
  if (pattern === null) return bundledVocabulary();

  const files = (await fg(pattern, { onlyFiles: true, absolute: true })).sort();
  if (files.length === 0) {
    throw new VocabularyError(pattern, "no vocabulary files match");
  }

  const vocabularies: Vocabulary[] = [];
  for (const file of files) {
    vocabularies.push(await loadVocabularyFile(file));
  }
  return mergeVocabularies(vocabularies);
}
