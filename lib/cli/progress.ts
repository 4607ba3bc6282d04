/**
 * CLI progress line for Observable-based steps.
 */

import type { Observable } from "rxjs";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: Pick<NodeJS.WritableStream, "write">;
}

export function renderProgressLine(
  spinner: string,
  label: string,
  current: number,
  total: number,
  options: { unit?: string; barWidth?: number } = {}
): string {
  const { unit = "pages", barWidth = 20 } = options;
  const filled = total > 0 ? Math.round((current / total) * barWidth) : 0;
  const empty = barWidth - filled;
  const bar = "█".repeat(filled) + "░".repeat(empty);
  return `${spinner} ${label}  ${bar}  ${current}/${total} ${unit}`;
}

export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => { current: number; total: number },
  options: ProgressOptions
): Promise<void> {
  const {
    label,
    unit = "pages",
    barWidth = 20,
    stream = process.stderr,
  } = options;

  let current = 0;
  let total = 0;
  let frame = 0;

  function render(spinner: string) {
    stream.write(`\r${renderProgressLine(spinner, label, current, total, { unit, barWidth })}`);
  }

  return new Promise<void>((resolve, reject) => {
    const timer = setInterval(() => {
      render(SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      frame++;
    }, 80);

    source.subscribe({
      next(value) {
        const progress = mapper(value);
        current = progress.current;
        total = progress.total;
      },
      error(err) {
        clearInterval(timer);
        // The caller reports the error itself.
        stream.write(`\r${renderProgressLine("✗", label, current, total, { unit, barWidth })}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        stream.write(`\r${renderProgressLine("✔", label, current, total, { unit, barWidth })}\n`);
        resolve();
      },
    });
  });
}
