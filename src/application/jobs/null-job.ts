import { setTimeout as sleep } from 'node:timers/promises';
import type { Job, JobParams } from '../../domain/index.js';

export const NULL_JOB_TYPE = 'null';

/**
 * Job that does nothing. `sleepMs` delays it, `fail: true` makes it
 * report failure and `allowRetries: false` marks it non-retryable.
 */
export function createNullJob(params: JobParams): Job {
  const sleepMs = typeof params['sleepMs'] === 'number' ? params['sleepMs'] : 0;
  const fail = params['fail'] === true;
  let lastError: string | null = null;

  return {
    type: NULL_JOB_TYPE,
    params,
    allowRetries: params['allowRetries'] !== false,
    get lastError() {
      return lastError;
    },
    async run() {
      if (sleepMs > 0) await sleep(sleepMs);
      if (fail) {
        lastError = 'Failure requested by job params';
        return false;
      }
      return true;
    },
  };
}
