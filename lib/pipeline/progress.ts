/**
 * Progress reporting for the extraction pipeline.
 *
 * Steps emit events through a `Progress`; implementations can log to the
 * console, feed a CLI spinner, or do nothing.
 */

export type StepName = "diagrams" | "structure";

export type ProgressEvent =
  | { type: "step-start"; step: StepName; book: string }
  | {
      type: "step-progress";
      step: StepName;
      book: string;
      message: string;
      page?: number;
      totalPages?: number;
    }
  | { type: "step-complete"; step: StepName; book: string }
  | { type: "step-error"; step: StepName; book: string; error: string };

export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for server logs.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "step-start":
          console.log(`[${event.book}] Starting ${formatStepName(event.step)}...`);
          break;
        case "step-progress":
          if (event.page !== undefined && event.totalPages !== undefined) {
            console.log(
              `[${event.book}] ${formatStepName(event.step)}: ${event.message} (${event.page}/${event.totalPages})`
            );
          } else {
            console.log(`[${event.book}] ${formatStepName(event.step)}: ${event.message}`);
          }
          break;
        case "step-complete":
          console.log(`[${event.book}] Completed ${formatStepName(event.step)}`);
          break;
        case "step-error":
          console.error(`[${event.book}] Error in ${formatStepName(event.step)}: ${event.error}`);
          break;
      }
    },
  };
}

/**
 * Callback-based progress emitter; forwards every event as-is.
 */
export function createCallbackProgress(callback: (event: ProgressEvent) => void): Progress {
  return { emit: callback };
}

export function formatStepName(step: StepName): string {
  switch (step) {
    case "diagrams":
      return "diagram extraction";
    case "structure":
      return "document structuring";
  }
}
