/**
 * Progress Reporter
 * 
 * Single owner of transfer console output. Transfers and the scheduler send
 * typed events; the reporter renders them and is the only place that writes,
 * so lines from concurrent transfers never interleave mid-line.
 */

import chalk from 'chalk';
import { formatBytes, formatPercent } from '@modelfetch/utils';

export type ReportEvent =
  | { type: 'progress'; task: string; downloaded: number; total?: number }
  | { type: 'skip'; task: string; path: string }
  | { type: 'done'; task: string; path: string }
  | { type: 'info'; task: string; message: string }
  | { type: 'warning'; task: string; message: string }
  | { type: 'failure'; task: string; message: string }
  | { type: 'notice'; message: string };

export interface TextSink {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ProgressReporterOptions {
  out?: TextSink;
  err?: TextSink;
  /** Defaults to whether `out` is a terminal */
  color?: boolean;
}

/**
 * Render an event as plain text, without line terminators
 */
export function formatEvent(event: ReportEvent): string {
  switch (event.type) {
    case 'progress':
      if (event.total !== undefined && event.total > 0) {
        return `[${event.task}] ${formatPercent(event.downloaded, event.total)}% ` +
          `(${formatBytes(event.downloaded)} / ${formatBytes(event.total)})`;
      }
      return `[${event.task}] ${formatBytes(event.downloaded)}`;
    case 'skip':
      return `[${event.task}] Skipping (exists): ${event.path}`;
    case 'done':
      return `[${event.task}] Done → ${event.path}`;
    case 'info':
      return `[${event.task}] ${event.message}`;
    case 'warning':
      return `[${event.task}] WARNING: ${event.message}`;
    case 'failure':
      return `[${event.task}] FAILED: ${event.message}`;
    case 'notice':
      return event.message;
  }
}

const paints: Record<ReportEvent['type'], (text: string) => string> = {
  progress: chalk.cyan,
  skip: chalk.gray,
  done: chalk.green,
  info: (text) => text,
  warning: chalk.yellow,
  failure: chalk.red,
  notice: chalk.blue,
};

export class ProgressReporter {
  private out: TextSink;
  private err: TextSink;
  private color: boolean;
  /** A progress line has been written without its newline */
  private lineOpen = false;

  constructor(options: ProgressReporterOptions = {}) {
    this.out = options.out ?? process.stdout;
    this.err = options.err ?? process.stderr;
    this.color = options.color ?? this.out.isTTY === true;
  }

  report(event: ReportEvent): void {
    const text = this.paint(event, formatEvent(event));

    if (event.type === 'progress') {
      this.out.write(`\r${text}`);
      this.lineOpen = true;
      return;
    }

    this.closeLine();
    const sink = event.type === 'warning' || event.type === 'failure' ? this.err : this.out;
    sink.write(`${text}\n`);
  }

  /**
   * Terminate an in-place progress line, if one is open
   */
  closeLine(): void {
    if (this.lineOpen) {
      this.out.write('\n');
      this.lineOpen = false;
    }
  }

  private paint(event: ReportEvent, text: string): string {
    return this.color ? paints[event.type](text) : text;
  }
}
