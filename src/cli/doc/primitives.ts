import * as Doc from "@effect/printer/Doc";
import type { Annotation } from "./annotation.js";

type SDoc = Doc.Doc<Annotation>;

export const ann = (a: Annotation, doc: SDoc): SDoc => Doc.annotate(doc, a);

export const label = (text: string): SDoc => ann("label", Doc.text(text));
export const value = (text: string): SDoc => ann("value", Doc.text(text));
