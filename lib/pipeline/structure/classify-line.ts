export const TOPIC_HEADING_RE = /^\d+\.\d+\s+(.+)$/;
export const EXERCISE_HEADING_RE = /^EXERCISE/;

/** All-capitals title line: letters and light punctuation, at least three letters. */
const CHAPTER_TITLE_RE = /^[A-Z][A-Z &',-]*$/;

export type LineKind =
  | { type: "chapter-title"; title: string }
  | { type: "topic-heading"; topicName: string }
  | { type: "exercise-heading"; heading: string }
  | { type: "body"; text: string };

export interface ClassifyContext {
  /** True while processing the first page of the document */
  firstPage: boolean;
  /** Chapter title to match exactly; null when none is known yet */
  chapterTitle: string | null;
  /** Whether an all-capitals line may be taken as the title when none is known */
  deriveTitle: boolean;
}

export function isTopicHeading(line: string): boolean {
  return TOPIC_HEADING_RE.test(line);
}

export function isExerciseHeading(line: string): boolean {
  return EXERCISE_HEADING_RE.test(line);
}

/**
 * Whether a line looks like a chapter title when none was configured.
 */
export function looksLikeChapterTitle(line: string): boolean {
  if (!CHAPTER_TITLE_RE.test(line)) return false;
  if (isExerciseHeading(line)) return false;
  const letters = line.replace(/[^A-Z]/g, "");
  return letters.length >= 3;
}

/**
 * Classify a trimmed, non-empty line. Checks run in priority order: chapter
 * title (first page only), topic heading, exercise heading, body.
 */
export function classifyLine(line: string, ctx: ClassifyContext): LineKind {
  if (ctx.firstPage) {
    const isTitle =
      ctx.chapterTitle !== null
        ? line === ctx.chapterTitle
        : ctx.deriveTitle && looksLikeChapterTitle(line);
    if (isTitle) {
      return { type: "chapter-title", title: line };
    }
  }

  const topic = TOPIC_HEADING_RE.exec(line);
  if (topic) {
    return { type: "topic-heading", topicName: topic[1] };
  }

  if (isExerciseHeading(line)) {
    return { type: "exercise-heading", heading: line };
  }

  return { type: "body", text: line };
}
