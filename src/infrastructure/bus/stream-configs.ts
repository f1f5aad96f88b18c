import { EventBusConfigError } from '../../domain/index.js';
import type { StreamConfig } from '../config/index.js';

/**
 * Stream configuration lookup. Keys written as `/pattern/` match stream
 * names by regular expression; an exact key always wins over a pattern.
 */
export class StreamConfigs {
  private readonly exact = new Map<string, StreamConfig>();
  private readonly patterns: Array<{ pattern: RegExp; config: StreamConfig }> = [];

  constructor(configs: Record<string, StreamConfig>) {
    for (const [key, config] of Object.entries(configs)) {
      if (key.length > 2 && key.startsWith('/') && key.endsWith('/')) {
        this.patterns.push({ pattern: compile(key), config });
      } else {
        this.exact.set(key, config);
      }
    }
  }

  get(stream: string): StreamConfig | undefined {
    const exact = this.exact.get(stream);
    if (exact) return exact;
    return this.patterns.find(({ pattern }) => pattern.test(stream))?.config;
  }
}

function compile(key: string): RegExp {
  try {
    return new RegExp(key.slice(1, -1));
  } catch (err: unknown) {
    throw new EventBusConfigError(`Invalid stream name pattern ${key}`, { cause: err });
  }
}
