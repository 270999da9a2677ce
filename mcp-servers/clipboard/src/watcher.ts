/**
 * Clipboard Watcher — timed ingestion trigger.
 *
 * Calls the handler on every tick. Ticks never overlap: while a previous
 * check is still in flight the tick is skipped, so triggers reach the
 * handler serialized.
 */

import { createLogger } from '../../_shared/ts/logger';

const log = createLogger('clipboard:watcher');

export type IngestionHandler = () => Promise<unknown>;

export class ClipboardWatcher {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;

  constructor(
    private readonly handler: IngestionHandler,
    private readonly intervalMs: number,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    log.debug(`Polling clipboard every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Run one check unless another is still in flight. Returns whether it ran. */
  async tick(): Promise<boolean> {
    if (this.inFlight) return false;
    this.inFlight = true;
    try {
      await this.handler();
    } catch (err) {
      log.error('Clipboard check failed', err);
    } finally {
      this.inFlight = false;
    }
    return true;
  }
}
