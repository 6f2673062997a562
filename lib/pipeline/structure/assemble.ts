import {
  extractionDocumentSchema,
  type Chapter,
  type ExtractionDocument,
} from "./document-schema";

export interface AssembleOptions {
  book: string | null;
  subject: string | null;
}

/**
 * Wrap the structured chapter in the response envelope. The result is deeply
 * frozen.
 */
export function assembleDocument(
  chapter: Chapter,
  { book, subject }: AssembleOptions
): ExtractionDocument {
  const document = extractionDocumentSchema.parse({
    response: { book, subject, chapters: [chapter] },
  });
  return deepFreeze(document);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
