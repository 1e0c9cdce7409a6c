// ============================================================================
// STORAGE MODULE EXPORTS
// ============================================================================
// Central export point for the storage contract, implementation and factory.

export type { IStorage, TaskMutationResult, NewTaskValues } from "./interface.js";
export { BaseStorage, buildAnalytics, completionRate, MAX_TITLE_LENGTH, MAX_DESCRIPTION_LENGTH } from "./interface.js";
export { SQLiteStorage } from "./sqlite.js";

import { IStorage } from "./interface.js";
import { SQLiteStorage } from "./sqlite.js";
import { Clock, StorageConfig } from "../types/index.js";

/**
 * Factory function to create the storage backend named by configuration.
 */
export function createStorage(config: StorageConfig, clock?: Clock): IStorage {
  switch (config.type) {
    case "sqlite":
      return new SQLiteStorage(config, clock);
  }
}

/**
 * Helper to get the storage type name for display
 */
export function getStorageTypeName(config: StorageConfig): string {
  switch (config.type) {
    case "sqlite":
      return `SQLite (${config.path})`;
  }
}
