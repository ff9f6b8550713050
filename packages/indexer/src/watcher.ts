import chokidar, { FSWatcher } from 'chokidar';
import path from 'path';
import { SKIP_DIRS } from './file_scanner';
import { createLogger } from './log';

const log = createLogger('watch');

/**
 * Collects changed paths and hands them over in one batch once no change
 * has arrived for `delayMs`. A batch that arrives while the previous one is
 * still being handled waits for it.
 */
export class ChangeCollector {
  private pending = new Set<string>();
  private timer?: NodeJS.Timeout;
  private running: Promise<void> = Promise.resolve();

  constructor(private handle: (files: string[]) => Promise<void>, private delayMs = 500) {}

  add(file: string) {
    this.pending.add(file);
    clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.running = this.running.then(() => this.flush());
    }, this.delayMs);
  }

  get size() {
    return this.pending.size;
  }

  /** Hands over whatever is pending now. */
  async flush(): Promise<void> {
    clearTimeout(this.timer);
    this.timer = undefined;
    if (!this.pending.size) return;
    const files = [...this.pending].sort();
    this.pending.clear();
    try {
      await this.handle(files);
    } catch (err) {
      log.error(`handling ${files.length} changed files failed`, err);
    }
  }

  /** Waits for the batch in progress, if any. */
  idle(): Promise<void> {
    return this.running;
  }

  stop() {
    clearTimeout(this.timer);
    this.timer = undefined;
  }
}

export interface WatchOptions {
  extensions: string[];
  delayMs?: number;
  onChange: (files: string[]) => Promise<void>;
}

export function startWatcher(root: string, options: WatchOptions): { watcher: FSWatcher; collector: ChangeCollector; close(): Promise<void> } {
  const extensions = new Set(options.extensions);
  const collector = new ChangeCollector(options.onChange, options.delayMs);
  const watcher = chokidar.watch(root, {
    ignored: (p: string) => path.relative(root, p).split(path.sep).some(segment => SKIP_DIRS.has(segment)),
    ignoreInitial: true,
  });
  const record = (file: string) => {
    if (extensions.has(path.extname(file))) collector.add(file);
  };
  watcher.on('add', record).on('change', record).on('unlink', record);
  watcher.on('error', err => log.error('watcher error', err));
  log.info(`watching ${root}`);
  return {
    watcher,
    collector,
    close: async () => {
      collector.stop();
      await watcher.close();
      await collector.idle();
      await collector.flush();
    },
  };
}
