import type { JsonPath } from "./document/JsonPath";
import type { LoadState } from "./tree/LazyNode";
import type { CleanupAction, MemoryStatus, PressureLevel } from "./services/MemoryPressureMonitor";
import { createEventBus, type EventBus } from "./utils/eventBus";

/**
 * Coarse change notifications for the presentation layer.
 * Declared as a type alias so it satisfies the bus's record constraint.
 */
export type JsonScopeEvents = {
  nodeUpdated: { path: JsonPath; pathKey: string; state: LoadState };
  childrenLoaded: { path: JsonPath; pathKey: string; count: number; total: number; partial: boolean };
  evicted: { paths: JsonPath[]; droppedNodes: number; reason: CleanupAction | "manual" };
  memoryLevelChanged: { previous: PressureLevel; level: PressureLevel };
  memoryStatus: MemoryStatus;
  documentReplaced: { previousDocumentId: number; documentId: number };
};

export type JsonScopeEventBus = EventBus<JsonScopeEvents>;

export function createJsonScopeEventBus(): JsonScopeEventBus {
  return createEventBus<JsonScopeEvents>();
}
