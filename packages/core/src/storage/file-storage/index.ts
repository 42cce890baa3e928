import { resolve } from "node:path";
import type { StorageProvider } from "../interfaces.js";
import { createSessionStore } from "./session-store.js";

export interface FileStorageOptions {
  /** Base directory for all data files (e.g. "./data") */
  dataDir: string;
}

export function createFileStorage(options: FileStorageOptions): StorageProvider {
  const dataDir = resolve(options.dataDir);

  return {
    sessions: createSessionStore(dataDir),
  };
}
