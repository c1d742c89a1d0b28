import * as Doc from "@effect/printer/Doc";
import * as AnsiDoc from "@effect/printer-ansi/AnsiDoc";
import type { Annotation } from "./annotation.js";
import { toAnsi } from "./annotation.js";

/** Strip annotations and lay the document out as plain text. */
export const renderPlain = (doc: Doc.Doc<Annotation>): string =>
  Doc.render(Doc.unAnnotate(doc), { style: "pretty" });

/** Map annotations to terminal colors. */
export const renderAnsi = (doc: Doc.Doc<Annotation>): string =>
  AnsiDoc.render(Doc.reAnnotate(doc, toAnsi), { style: "pretty" });
