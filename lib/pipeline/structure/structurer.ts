/**
 * Document Structurer
 *
 * Single-pass state machine over the text lines of every page. Lines are
 * classified as chapter title, topic heading, exercise heading or body text and
 * folded into a chapter tree. Diagrams are attached page by page: every body
 * flush receives all diagrams of the page being processed.
 */

import type { PageLines } from "@/lib/pdf/line-stream";
import { classifyLine } from "./classify-line";
import {
  createChapter,
  createExercise,
  createSection,
  createTopic,
  type Chapter,
  type Diagram,
  type Exercise,
  type ImageRef,
  type Section,
  type Topic,
} from "./document-schema";

export interface StructureOptions {
  /** Known chapter title; when absent the first all-capitals line of page 1 is used */
  chapterTitle?: string | null;
  /** Chapter name used when no title line is found */
  defaultChapterName: string;
}

interface ExerciseDraft {
  heading: string;
  contentLines: string[];
  imageUrls: ImageRef[];
}

interface TopicDraft {
  topicName: string;
  sections: Section[];
  exercises: ExerciseDraft[];
}

export interface StructurerState {
  chapterName: string | null;
  chapterTitle: string | null;
  topics: Topic[];
  chapterExercises: ExerciseDraft[];
  currentTopic: TopicDraft | null;
  currentExercise: ExerciseDraft | null;
  pendingContentLines: string[];
  inExerciseBlock: boolean;
  pageNumber: number;
  pagesSeen: number;
  sawHeading: boolean;
}

export class DocumentStructurer {
  private readonly state: StructurerState;
  private readonly diagramsByPage = new Map<number, Diagram[]>();
  private finished = false;

  constructor(
    diagrams: readonly Diagram[],
    private readonly options: StructureOptions
  ) {
    for (const diagram of diagrams) {
      const list = this.diagramsByPage.get(diagram.page) ?? [];
      list.push(diagram);
      this.diagramsByPage.set(diagram.page, list);
    }
    this.state = {
      chapterName: null,
      chapterTitle: options.chapterTitle ?? null,
      topics: [],
      chapterExercises: [],
      currentTopic: null,
      currentExercise: null,
      pendingContentLines: [],
      inExerciseBlock: false,
      pageNumber: 0,
      pagesSeen: 0,
      sawHeading: false,
    };
  }

  /** Feed the next page; pages must arrive in document order. */
  processPage(page: PageLines): void {
    if (this.finished) {
      throw new Error("DocumentStructurer already finished");
    }
    const s = this.state;
    s.pageNumber = page.pageNumber;
    const firstPage = s.pagesSeen === 0;

    for (const raw of page.lines) {
      const line = raw.trim();
      if (!line) continue;

      const kind = classifyLine(line, {
        firstPage,
        chapterTitle: s.chapterTitle,
        deriveTitle: !s.sawHeading,
      });

      switch (kind.type) {
        case "chapter-title":
          s.chapterTitle = kind.title;
          s.chapterName = kind.title;
          break;
        case "topic-heading":
          this.openTopic(kind.topicName);
          break;
        case "exercise-heading":
          this.openExercise(kind.heading);
          break;
        case "body":
          s.pendingContentLines.push(kind.text);
          break;
      }
    }

    this.flush();
    s.pagesSeen++;
  }

  /** Close any open topic and return the finished chapter. */
  finish(): Chapter {
    if (this.finished) {
      throw new Error("DocumentStructurer already finished");
    }
    this.flush();
    this.closeExercise();
    this.closeTopic();
    this.finished = true;

    const s = this.state;
    return createChapter(
      s.chapterName ?? this.options.defaultChapterName,
      s.topics,
      s.chapterExercises.map(toExercise)
    );
  }

  /** Snapshot of the parser state, for inspection in tests and tooling. */
  getState(): Readonly<StructurerState> {
    return this.state;
  }

  private openTopic(topicName: string): void {
    this.flush();
    this.closeExercise();
    this.closeTopic();
    this.state.sawHeading = true;
    this.state.currentTopic = { topicName, sections: [], exercises: [] };
  }

  private openExercise(heading: string): void {
    this.flush();
    const s = this.state;
    const draft: ExerciseDraft = { heading, contentLines: [], imageUrls: [] };
    if (s.currentTopic) {
      s.currentTopic.exercises.push(draft);
    } else {
      s.chapterExercises.push(draft);
    }
    s.currentExercise = draft;
    s.inExerciseBlock = true;
    s.sawHeading = true;
  }

  private closeExercise(): void {
    this.state.currentExercise = null;
    this.state.inExerciseBlock = false;
  }

  private closeTopic(): void {
    const s = this.state;
    if (!s.currentTopic) return;
    const t = s.currentTopic;
    s.topics.push(createTopic(t.topicName, t.sections, t.exercises.map(toExercise)));
    s.currentTopic = null;
  }

  /**
   * Move pending lines into the open exercise, else into the open topic as a
   * new section. With neither open the lines are dropped.
   */
  private flush(): void {
    const s = this.state;
    if (s.pendingContentLines.length === 0) return;
    const lines = s.pendingContentLines;
    s.pendingContentLines = [];
    const images = this.pageImages();

    if (s.currentExercise) {
      s.currentExercise.contentLines.push(...lines);
      addImages(s.currentExercise.imageUrls, images);
    } else if (s.currentTopic) {
      const sections = s.currentTopic.sections;
      sections.push(createSection(sections.length + 1, lines.join("\n"), images));
    }
  }

  private pageImages(): ImageRef[] {
    const diagrams = this.diagramsByPage.get(this.state.pageNumber) ?? [];
    return diagrams.map((d) => ({ img: d.imagePath }));
  }
}

function addImages(target: ImageRef[], images: ImageRef[]): void {
  for (const image of images) {
    if (!target.some((existing) => existing.img === image.img)) {
      target.push(image);
    }
  }
}

function toExercise(draft: ExerciseDraft): Exercise {
  return createExercise(draft.heading, draft.contentLines.join("\n"), draft.imageUrls);
}

/**
 * Run the structurer over every page and return the chapter.
 */
export function structureDocument(
  pages: readonly PageLines[],
  diagrams: readonly Diagram[],
  options: StructureOptions
): Chapter {
  const structurer = new DocumentStructurer(diagrams, options);
  for (const page of pages) {
    structurer.processPage(page);
  }
  return structurer.finish();
}
