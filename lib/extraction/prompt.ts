/**
 * Prompts for reading a handwritten spreadsheet photo into JSON.
 */

import type { HeaderStrategy } from "./types";

export const SYSTEM_PROMPT =
  "You are a highly accurate handwriting transcription engine for tabular data. Always respond with valid JSON only, no explanations.";

// JSON numbers past 2^53 lose digits when parsed
const VALUE_RULES = `Value rules:
- Write every "value" as a JSON string, including numbers, dates and phone or account numbers ("0042", not 42)
- Copy digits exactly as written; never round, reformat or drop leading zeros`;

const CONFIDENCE_RULES = `Confidence rules:
- Give every cell a confidence between 0.0 and 1.0 based on how legible the handwriting is
- 0.8 or higher for clear, well-formed text
- 0.5 to 0.7 for unclear, smudged or ambiguous text
- 0.0 to 0.4 for illegible or missing text (use "" as the value when nothing can be read)`;

function exampleHeaders(strategy: HeaderStrategy): string[] {
  if (strategy.mode === "specify") return strategy.headers;
  return ["header1", "header2"];
}

function buildFormatExample(headers: string[]): string {
  const row = (values: string[], scores: number[]) =>
    "{" +
    headers
      .map((h, i) => `${JSON.stringify(h)}: {"value": ${JSON.stringify(values[i % values.length])}, "confidence": ${scores[i % scores.length]}}`)
      .join(", ") +
    "}";

  return `{
  "headers": [${headers.map((h) => JSON.stringify(h)).join(", ")}],
  "rows": [
    ${row(["value1", "value2"], [0.95, 0.87])},
    ${row(["value3", "value4"], [0.62, 0.91])}
  ]
}`;
}

/**
 * Build the user prompt sent alongside the image.
 *
 * In "auto" mode the model is asked to read the header row from the image;
 * in "specify" mode it must map every value onto the caller's columns.
 */
export function buildExtractionPrompt(strategy: HeaderStrategy, instructions: string): string {
  const task =
    strategy.mode === "specify"
      ? `Required columns, in this order: ${strategy.headers.join(", ")}

Map every value you read to one of these columns. Use the column names exactly as given, even if the handwritten header row differs. Every row must contain every required column.`
      : `Detect the header row in the image and use those header names, exactly as written, as the column names. Do not include the header row itself in "rows".`;

  const extra = instructions.trim() ? `\n\nAdditional instructions: ${instructions.trim()}` : "";

  return `Perform optical character recognition on this photo of a handwritten spreadsheet and return its contents as a table.

Your task is to:
1. Read ALL handwritten text in the image
2. Identify the table structure: rows and columns
3. Return one JSON object with the column headers and one entry per data row, with a confidence score for every cell

${task}${extra}

RETURN JSON EXACTLY IN THIS FORMAT:

${buildFormatExample(exampleHeaders(strategy))}

${VALUE_RULES}

${CONFIDENCE_RULES}

Return ONLY the JSON object.`;
}
