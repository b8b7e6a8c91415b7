import type { IIngestionTracker } from "./tracker.interface.js";

export class InMemoryIngestionTracker implements IIngestionTracker {
  private readonly ids: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.ids = new Set(initial);
  }

  async has(sourceId: string): Promise<boolean> {
    return this.ids.has(sourceId);
  }

  async mark(sourceId: string): Promise<void> {
    this.ids.add(sourceId);
  }

  async list(): Promise<string[]> {
    return [...this.ids].sort();
  }
}
