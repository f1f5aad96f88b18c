import {
  UnknownJobTypeError,
  type Job,
  type JobConstructor,
  type JobParams,
} from '../domain/index.js';

/** Job types that may be run through the job execution endpoint. */
export class JobRegistry {
  private readonly constructors = new Map<string, JobConstructor>();

  register(type: string, create: JobConstructor): this {
    this.constructors.set(type, create);
    return this;
  }

  has(type: string): boolean {
    return this.constructors.has(type);
  }

  get types(): string[] {
    return [...this.constructors.keys()].sort();
  }

  /** Throws `UnknownJobTypeError`, or whatever the job's constructor throws. */
  create(type: string, params: JobParams): Job {
    const create = this.constructors.get(type);
    if (!create) throw new UnknownJobTypeError(type);
    return create(params);
  }
}
