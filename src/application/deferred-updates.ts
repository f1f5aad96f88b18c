import type { Logger } from 'pino';
import type { RequestContext } from '../domain/index.js';

/** Work to run once the main part of a unit of work has finished. */
export interface DeferredUpdate {
  readonly name: string;
  doUpdate(context: RequestContext): Promise<unknown>;
}

/** An update that folds later updates with the same `mergeKey` into itself. */
export interface MergeableUpdate extends DeferredUpdate {
  readonly mergeKey: string;
  merge(other: MergeableUpdate): void;
}

function isMergeable(update: DeferredUpdate): update is MergeableUpdate {
  return 'mergeKey' in update && 'merge' in update;
}

/**
 * Pending work for one unit of work (a request, a job run).
 *
 * Never shared between units of work. `run` drains the queue in order,
 * including updates added while it runs, and logs failing updates
 * without stopping.
 */
export class DeferredUpdateQueue {
  private readonly queue: DeferredUpdate[] = [];

  constructor(
    private readonly log: Logger,
    readonly context: RequestContext,
  ) {}

  get size(): number {
    return this.queue.length;
  }

  add(update: DeferredUpdate): void {
    if (isMergeable(update)) {
      const existing = this.queue.find(
        (queued): queued is MergeableUpdate => isMergeable(queued) && queued.mergeKey === update.mergeKey,
      );
      if (existing) {
        existing.merge(update);
        return;
      }
    }
    this.queue.push(update);
  }

  addCallable(name: string, fn: () => Promise<void> | void): void {
    this.queue.push({
      name,
      doUpdate: async () => fn(),
    });
  }

  /** Runs every queued update once. Resolves to the number that failed. */
  async run(): Promise<number> {
    let failed = 0;
    for (let update = this.queue.shift(); update; update = this.queue.shift()) {
      try {
        await update.doUpdate(this.context);
      } catch (err: unknown) {
        failed++;
        this.log.error(
          { err, update: update.name, request_id: this.context.requestId },
          'Deferred update failed',
        );
      }
    }
    return failed;
  }
}
