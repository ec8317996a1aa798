import { load } from "cheerio";
import type { ItemMetadata } from "../types";

function normalizeCellText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Maps the cells of one listing `<tr>` onto `fields` by position. Missing
 * cells become empty strings; extra cells are ignored.
 */
export function parseRowMetadata(rowHtml: string, fields: readonly string[]): ItemMetadata {
  // Bare <tr> markup is dropped by the parser outside a table context.
  const $ = load(`<table><tbody>${rowHtml}</tbody></table>`);
  const cells = $("tr").first().children("td, th");
  const values = cells.toArray().map((cell) => normalizeCellText($(cell).text()));

  return fields.map((field, index) => [field, values[index] ?? ""] as const);
}

export function emptyMetadata(fields: readonly string[]): ItemMetadata {
  return fields.map((field) => [field, ""] as const);
}
