import * as log from './log';

/**
 * Class that manages running at most one instance of an async job
 *
 * If new requests come in while a job is already running, the job
 * will be run again once.
 *
 * The callback is passed to every enqueue request rather than to the
 * constructor. Don't pass callbacks that depend on arguments, you
 * might not like the results.
 */
export class OneAtATime {
  private _running = false;
  private _queued = false;
  private current: Promise<void> = Promise.resolve();

  public tryRun(cb: () => Promise<void>) {
    if (this._running) {
      this._queued = true;
      return;
    }

    this._running = true;
    this._queued = true;
    this.current = this.loop(cb);
  }

  /**
   * Resolves once no job is running or queued
   */
  public idle(): Promise<void> {
    return this.current;
  }

  private async loop(cb: () => Promise<void>) {
    try {
      while (this._queued) {
        try {
          this._queued = false;
          await cb();
        } catch (e) {
          log.error(`Error in background job: ${e}`);
        }
      }
    } finally {
      this._running = false;
    }
  }
}
