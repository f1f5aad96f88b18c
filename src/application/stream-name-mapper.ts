/**
 * Maps the default stream names used by event producers to the names
 * configured for this wiki. Unmapped names pass through.
 */
export class StreamNameMapper {
  constructor(private readonly streamNamesMap: Readonly<Record<string, string>> = {}) {}

  resolve(defaultName: string): string {
    return this.streamNamesMap[defaultName] ?? defaultName;
  }

  /** Stream configured under `key`, or the mapped `defaultName`. */
  resolveKey(key: string, defaultName: string): string {
    return this.streamNamesMap[key] ?? this.resolve(defaultName);
  }
}
