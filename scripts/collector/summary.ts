import Table from "cli-table3";

import type { CsvRow } from "../report/csv";
import { summarizeRows } from "../report/markdown";

export interface SummarySection {
  label: string;
  rows: CsvRow[];
}

const SUMMARY_LANGUAGES = 3;

/** Console overview of a run: counts and the leading languages per listing. */
export function summaryTable(sections: SummarySection[]): string {
  const table = new Table({
    head: ["Listing", "Total", "Public", "Private", "Original", "Forks", "Archived", "Top languages"],
  });

  for (const { label, rows } of sections) {
    const summary = summarizeRows(rows);
    table.push([
      label,
      summary.total,
      summary.public,
      summary.private,
      summary.originals,
      summary.forks,
      summary.archived,
      summary.languages
        .slice(0, SUMMARY_LANGUAGES)
        .map(({ language, count }) => `${language}: ${count}`)
        .join(", ") || "-",
    ]);
  }

  return table.toString();
}
