/** A `Label: value` line; omitted when the value is missing or empty. */
export type TranscriptField = readonly [label: string, value: string | undefined];

export interface TranscriptOptions {
  fields?: readonly TranscriptField[];
  sections?: readonly (readonly string[])[];
  footer?: readonly string[];
}

/**
 * Joins the fields, each section and the footer into one text, with a single
 * blank line between non-empty blocks.
 */
export function renderTranscript(options: TranscriptOptions): string {
  const { fields = [], sections = [], footer = [] } = options;

  const fieldLines = fields.flatMap(([label, value]) =>
    value ? [`${label}: ${value}`] : [],
  );

  return [fieldLines, ...sections, footer]
    .filter((block) => block.length > 0)
    .map((block) => block.join("\n"))
    .join("\n\n");
}
