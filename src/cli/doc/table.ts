import * as Doc from "@effect/printer/Doc";
import type { Annotation } from "./annotation.js";
import { renderAnsi, renderPlain } from "./render.js";
import { ann, label, value } from "./primitives.js";

export type SDoc = Doc.Doc<Annotation>;

export type CellStyle = "label" | "value" | "dim" | "accent" | "success" | "error";

export interface TableConfig {
  readonly headers: ReadonlyArray<string>;
  readonly rows: ReadonlyArray<ReadonlyArray<string>>;
  /** Per-column styles for data cells; unset columns render as values. */
  readonly styles?: ReadonlyArray<CellStyle | undefined>;
}

export const columnWidths = (
  headers: ReadonlyArray<string>,
  rows: ReadonlyArray<ReadonlyArray<string>>
): ReadonlyArray<number> =>
  headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length))
  );

const styled = (content: string, style: CellStyle): SDoc => {
  switch (style) {
    case "label":
      return label(content);
    case "value":
      return value(content);
    default:
      return ann(style, Doc.text(content));
  }
};

// Padding is applied to the raw text so styled and plain output align alike.
const cell = (content: string, width: number, style: CellStyle): SDoc =>
  styled(content.padEnd(width), style);

// The last column is left unpadded so lines carry no trailing spaces.
const line = (
  contents: ReadonlyArray<string>,
  widths: ReadonlyArray<number>,
  style: (index: number) => CellStyle
): SDoc =>
  Doc.hsep(
    contents.map((content, i) =>
      i === contents.length - 1
        ? styled(content, style(i))
        : cell(content, widths[i] ?? 0, style(i))
    )
  );

export const buildTableDoc = (config: TableConfig): SDoc => {
  const { headers, rows, styles = [] } = config;
  const widths = columnWidths(headers, rows);
  const header = line(headers, widths, () => "label");
  const separator = Doc.hsep(widths.map((w) => ann("dim", Doc.text("-".repeat(w)))));
  const body = rows.map((row) => line(row, widths, (i) => styles[i] ?? "value"));
  return Doc.vsep([header, separator, ...body]);
};

export const renderTable = (config: TableConfig, ansi = false): string => {
  const doc = buildTableDoc(config);
  return ansi ? renderAnsi(doc) : renderPlain(doc);
};
