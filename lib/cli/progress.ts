/**
 * CLI progress display: a spinner with a progress bar on stderr.
 */

import type { Observable } from "rxjs";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: Pick<NodeJS.WritableStream, "write">;
}

export interface ProgressCount {
  current: number;
  total: number;
}

export function renderBar(current: number, total: number, barWidth: number): string {
  const filled = total > 0 ? Math.min(barWidth, Math.round((current / total) * barWidth)) : 0;
  return "█".repeat(filled) + "░".repeat(barWidth - filled);
}

/**
 * Subscribe to `source`, drawing progress for every value the mapper turns
 * into a count. Resolves with the last value emitted.
 */
export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => ProgressCount | null,
  options: ProgressOptions
): Promise<T | undefined> {
  const {
    label,
    unit = "pages",
    barWidth = 20,
    stream = process.stderr,
  } = options;

  let current = 0;
  let total = 0;
  let frame = 0;
  let last: T | undefined;

  function render(spinner: string) {
    const line = `${spinner} ${label}  ${renderBar(current, total, barWidth)}  ${current}/${total} ${unit}`;
    stream.write(`\r${line}`);
  }

  return new Promise<T | undefined>((resolve, reject) => {
    const timer = setInterval(() => {
      render(SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      frame++;
    }, 80);

    source.subscribe({
      next(value) {
        last = value;
        const progress = mapper(value);
        if (progress) {
          current = progress.current;
          total = progress.total;
        }
      },
      error(err) {
        clearInterval(timer);
        stream.write("\n");
        stream.write(`✗ ${label}  ${String(err)}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        stream.write(`\r✔ ${label}  ${renderBar(total, total, barWidth)}  ${current}/${total} ${unit}\n`);
        resolve(last);
      },
    });
  });
}
