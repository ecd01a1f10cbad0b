import { vocabularyEntries, type Vocabulary, type VocabularyEntry } from "@bitfit/vocabulary";
import { renderTable, section, type Column } from "./table";

const columns: Column<VocabularyEntry>[] = [
  { header: "Short", value: (entry) => entry.identifier },
  { header: "Description", value: (entry) => entry.description },
];

export function renderDescriptions(vocabulary: Vocabulary): string {
  return [
    section("SHORT FORM -> DESCRIPTION"),
    ...renderTable(columns, vocabularyEntries(vocabulary)),
  ].join("\n");
}
