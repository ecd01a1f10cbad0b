export interface VocabularyEntry {
  index: number;
  identifier: string;
  description: string;
}

/**
 * Identifiers and their descriptions, aligned by index.
 */
export interface Vocabulary {
  name: string;
  identifiers: readonly string[];
  descriptions: readonly string[];
}
