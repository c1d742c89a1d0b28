/** Command description followed by optional notes and an indented examples block. */
export const withExamples = (
  description: string,
  examples: ReadonlyArray<string>,
  notes: ReadonlyArray<string> = []
) =>
  [
    description,
    ...(notes.length > 0 ? ["", ...notes] : []),
    ...(examples.length > 0 ? ["", "Examples:", ...examples.map((example) => `  ${example}`)] : [])
  ].join("\n");
