import type { EmissionEntry } from "../emissions/types.js";

/**
 * Reads a reporting snapshot from some source (file path, upload id, ...).
 */
export interface EntryLoader {
  load(source: string): Promise<EmissionEntry[]>;
}
