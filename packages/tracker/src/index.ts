export type { IIngestionTracker } from "./tracker.interface.js";
export { JsonFileIngestionTracker } from "./json-file-tracker.js";
export { InMemoryIngestionTracker } from "./in-memory-tracker.js";
