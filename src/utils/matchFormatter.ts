/**
 * Output formatting for match records.
 */

import { MatchRecord } from "../types/biprws.js";

export type OutputFormat = "json" | "csv";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "csv"];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

const CSV_COLUMNS: ReadonlyArray<[keyof MatchRecord, string]> = [
  ["reportPath", "ReportPath"],
  ["reportName", "ReportName"],
  ["dataProvider", "DataProvider"],
  ["objectName", "ObjectName"],
];

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatMatchesAsCsv(matches: MatchRecord[]): string {
  const header = CSV_COLUMNS.map(([, title]) => title).join(",");
  const rows = matches.map((match) =>
    CSV_COLUMNS.map(([key]) => escapeCsvField(match[key])).join(","),
  );
  return [header, ...rows].join("\n");
}

export function formatMatches(
  matches: MatchRecord[],
  format: OutputFormat,
): string {
  if (format === "csv") {
    return formatMatchesAsCsv(matches);
  }
  return JSON.stringify(matches, null, 2);
}
