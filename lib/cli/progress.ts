/**
 * CLI progress display for a generation run.
 *
 * One animated line per pipeline phase: spinner, phase, message and a
 * progress bar when the phase reports counts.
 */

import type { Observable } from "rxjs";
import type { GenerationEvent } from "../pipeline/node";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const HIDE_CURSOR = `${ESC}[?25l`;
const SHOW_CURSOR = `${ESC}[?25h`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export interface ProgressStream {
  write(chunk: string): unknown;
}

export interface ProgressOptions {
  barWidth?: number;
  /** Defaults to stderr. */
  stream?: ProgressStream;
}

interface PhaseLine {
  phase: string;
  message: string;
  current?: number;
  total?: number;
}

/**
 * Subscribe to a generation and render its progress until it finishes.
 * Resolves with the `done` value.
 */
export function runWithProgress<T>(
  source: Observable<GenerationEvent<T>>,
  options: ProgressOptions = {}
): Promise<T> {
  const { barWidth = 20, stream = process.stderr } = options;
  const startTime = Date.now();

  let line: PhaseLine | null = null;
  let frame = 0;

  function bar(current: number, total: number): string {
    const filled = total > 0 ? Math.min(barWidth, Math.round((current / total) * barWidth)) : 0;
    return `${GREEN}${"█".repeat(filled)}${RESET}${DIM}${"░".repeat(barWidth - filled)}${RESET}`;
  }

  function format(spinner: string, l: PhaseLine): string {
    const counts =
      l.total !== undefined && l.current !== undefined
        ? `  ${bar(l.current, l.total)}  ${l.current}/${l.total}`
        : "";
    return `${spinner} ${BOLD}${l.phase}${RESET}  ${l.message}${counts}`;
  }

  function render() {
    if (!line) return;
    const spinner = `${CYAN}${SPINNER_FRAMES[frame % SPINNER_FRAMES.length]}${RESET}`;
    stream.write(`\r${CLEAR_LINE}${format(spinner, line)}  ${DIM}${formatDuration(Date.now() - startTime)}${RESET}`);
  }

  function finishLine(mark: string) {
    if (!line) return;
    stream.write(`\r${CLEAR_LINE}${format(mark, line)}\n`);
    line = null;
  }

  return new Promise<T>((resolve, reject) => {
    let result: { value: T } | null = null;
    stream.write(HIDE_CURSOR);
    const timer = setInterval(() => {
      frame++;
      render();
    }, 80);

    const stop = () => {
      clearInterval(timer);
      stream.write(SHOW_CURSOR);
    };

    source.subscribe({
      next(event) {
        if (event.type === "done") {
          result = { value: event.value };
          return;
        }
        if (line && line.phase !== event.phase) finishLine(`${GREEN}✔${RESET}`);
        line = { phase: event.phase, message: event.message, current: event.completed, total: event.total };
        render();
      },
      error(err) {
        finishLine(`${RED}✗${RESET}`);
        stop();
        reject(err);
      },
      complete() {
        finishLine(`${GREEN}✔${RESET}`);
        stop();
        if (!result) {
          reject(new Error("Generation finished without a result"));
          return;
        }
        stream.write(`${GREEN}✔${RESET} ${BOLD}Done${RESET} in ${formatDuration(Date.now() - startTime)}\n`);
        resolve(result.value);
      },
    });
  });
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}
