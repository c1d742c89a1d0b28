import * as Ansi from "@effect/printer-ansi/Ansi";

export type Annotation = "label" | "value" | "dim" | "accent" | "success" | "error";

export const toAnsi = (a: Annotation): Ansi.Ansi => {
  switch (a) {
    case "label": case "dim": return Ansi.blackBright;
    case "value": return Ansi.white;
    case "accent": return Ansi.cyan;
    case "success": return Ansi.green;
    case "error": return Ansi.red;
  }
};
