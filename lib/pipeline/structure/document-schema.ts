import { z } from "zod/v4";

// ============================================================================
// Schemas
// ============================================================================

export const diagramSchema = z.object({
  page: z.number().int().min(1),
  x: z.number().min(0),
  y: z.number().min(0),
  width: z.number().positive(),
  height: z.number().positive(),
  imagePath: z.string().regex(/^\/images\/[^/]+\/page_\d+_diagram_\d+\.jpg$/),
});

export const imageRefSchema = z.object({
  img: z.string().min(1),
});

export const sectionSchema = z.object({
  sectionName: z.string().min(1),
  content: z.string(),
  imageUrls: z.array(imageRefSchema),
});

export const exerciseSchema = z.object({
  exercise: z.string().min(1),
  content: z.string(),
  imageUrls: z.array(imageRefSchema),
});

export const topicSchema = z.object({
  topicName: z.string().min(1),
  imageUrls: z.array(imageRefSchema),
  sections: z.array(sectionSchema),
  exercises: z.array(exerciseSchema),
});

export const chapterSchema = z.object({
  chapterName: z.string(),
  topics: z.array(topicSchema),
  exercises: z.array(exerciseSchema),
});

export const extractionDocumentSchema = z.object({
  response: z.object({
    book: z.string().nullable(),
    subject: z.string().nullable(),
    chapters: z.array(chapterSchema),
  }),
});

export type Diagram = z.infer<typeof diagramSchema>;
export type ImageRef = z.infer<typeof imageRefSchema>;
export type Section = z.infer<typeof sectionSchema>;
export type Exercise = z.infer<typeof exerciseSchema>;
export type Topic = z.infer<typeof topicSchema>;
export type Chapter = z.infer<typeof chapterSchema>;
export type ExtractionDocument = z.infer<typeof extractionDocumentSchema>;

// ============================================================================
// Constructors
// ============================================================================

export interface PageSize {
  width: number;
  height: number;
}

/** Served path of a diagram crop. */
export function diagramImagePath(bookName: string, page: number, index: number): string {
  return `/images/${bookName}/${diagramFileName(page, index)}`;
}

export function diagramFileName(page: number, index: number): string {
  return `page_${page}_diagram_${index}.jpg`;
}

/**
 * Build a diagram record. The box must have a positive size and lie inside the
 * originating page.
 */
export function createDiagram(input: Diagram, pageSize: PageSize): Diagram {
  const diagram = diagramSchema.parse(input);
  // Small tolerance for float noise from the pixel-to-point division.
  const eps = 1e-6;
  if (
    diagram.x + diagram.width > pageSize.width + eps ||
    diagram.y + diagram.height > pageSize.height + eps
  ) {
    throw new Error(
      `Diagram ${diagram.imagePath} exceeds page bounds ${pageSize.width}x${pageSize.height}`
    );
  }
  return Object.freeze(diagram);
}

export function createSection(
  index: number,
  content: string,
  imageUrls: ImageRef[]
): Section {
  return Object.freeze(
    sectionSchema.parse({ sectionName: `Section ${index}`, content, imageUrls })
  );
}

export function createExercise(
  heading: string,
  content: string,
  imageUrls: ImageRef[]
): Exercise {
  return Object.freeze(exerciseSchema.parse({ exercise: heading, content, imageUrls }));
}

export function createTopic(
  topicName: string,
  sections: Section[],
  exercises: Exercise[],
  imageUrls: ImageRef[] = []
): Topic {
  return Object.freeze(
    topicSchema.parse({ topicName, imageUrls, sections, exercises })
  );
}

export function createChapter(
  chapterName: string,
  topics: Topic[],
  exercises: Exercise[]
): Chapter {
  return Object.freeze(chapterSchema.parse({ chapterName, topics, exercises }));
}
