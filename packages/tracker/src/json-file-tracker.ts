import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { TrackerStateError } from "@logrecall/errors";
import type { IIngestionTracker } from "./tracker.interface.js";

const trackerFileSchema = z.array(z.string());

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Tracker persisted as a JSON array of source ids.
 *
 * Every `mark` re-reads the file, adds the id and rewrites the whole sorted
 * set through a temporary sibling that is renamed over the target, so a
 * crash mid-write leaves either the old or the new list on disk.
 */
export class JsonFileIngestionTracker implements IIngestionTracker {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async has(sourceId: string): Promise<boolean> {
    const ids = await this.load();
    return ids.has(sourceId);
  }

  async mark(sourceId: string): Promise<void> {
    const ids = await this.load();
    if (ids.has(sourceId)) return;

    ids.add(sourceId);
    await this.save(ids);
  }

  async list(): Promise<string[]> {
    return [...(await this.load())].sort();
  }

  private async load(): Promise<Set<string>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err: unknown) {
      if (isMissingFile(err)) return new Set();
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err: unknown) {
      throw new TrackerStateError("Tracker file is not valid JSON", this.filePath, { cause: err });
    }

    const parsed = trackerFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new TrackerStateError("Tracker file must hold an array of strings", this.filePath, {
        cause: parsed.error,
      });
    }
    return new Set(parsed.data);
  }

  private async save(ids: Set<string>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${String(process.pid)}.tmp`;
    await writeFile(tmpPath, JSON.stringify([...ids].sort(), null, 2), "utf8");
    await rename(tmpPath, this.filePath);
  }
}
