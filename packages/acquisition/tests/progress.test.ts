import { ProgressReporter, formatEvent } from '../src/progress.js';
import { MemorySink } from './helpers.js';

describe('formatEvent', () => {
  it('should show percentage and sizes when the total is known', () => {
    expect(formatEvent({ type: 'progress', task: 'vae', downloaded: 512, total: 1024 }))
      .toBe('[vae]  50.00% (512.0B / 1.0KB)');
  });

  it('should show only the downloaded size without a total', () => {
    expect(formatEvent({ type: 'progress', task: 'vae', downloaded: 1536 })).toBe('[vae] 1.5KB');
  });

  it('should render skip, done and warning lines', () => {
    expect(formatEvent({ type: 'skip', task: 'a', path: 'out/a.bin' })).toBe('[a] Skipping (exists): out/a.bin');
    expect(formatEvent({ type: 'done', task: 'a', path: 'out/a.bin' })).toBe('[a] Done → out/a.bin');
    expect(formatEvent({ type: 'warning', task: 'a', message: 'careful' })).toBe('[a] WARNING: careful');
    expect(formatEvent({ type: 'failure', task: 'a', message: 'HTTP 500' })).toBe('[a] FAILED: HTTP 500');
    expect(formatEvent({ type: 'notice', message: 'plain' })).toBe('plain');
  });
});

describe('ProgressReporter', () => {
  it('should overwrite progress in place and close the line before the next message', () => {
    const out = new MemorySink();
    const err = new MemorySink();
    const reporter = new ProgressReporter({ out, err });

    reporter.report({ type: 'progress', task: 'a', downloaded: 10 });
    reporter.report({ type: 'progress', task: 'a', downloaded: 20 });
    reporter.report({ type: 'done', task: 'a', path: 'a.bin' });

    expect(out.chunks).toEqual([
      '\r[a] 10.0B',
      '\r[a] 20.0B',
      '\n',
      '[a] Done → a.bin\n',
    ]);
    expect(err.chunks).toEqual([]);
  });

  it('should send warnings and failures to the error sink', () => {
    const out = new MemorySink();
    const err = new MemorySink();
    const reporter = new ProgressReporter({ out, err });

    reporter.report({ type: 'progress', task: 'a', downloaded: 1 });
    reporter.report({ type: 'warning', task: 'a', message: 'odd' });
    reporter.report({ type: 'failure', task: 'b', message: 'boom' });

    expect(out.text()).toBe('\r[a] 1.0B\n');
    expect(err.text()).toBe('[a] WARNING: odd\n[b] FAILED: boom\n');
  });

  it('should not emit a newline when no progress line is open', () => {
    const out = new MemorySink();
    const reporter = new ProgressReporter({ out, err: new MemorySink() });

    reporter.closeLine();
    reporter.report({ type: 'notice', message: 'hello' });

    expect(out.chunks).toEqual(['hello\n']);
  });
});
