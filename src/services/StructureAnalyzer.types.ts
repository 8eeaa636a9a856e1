/**
 * Aggregate structure of a decoded document, computed once per document.
 * Depth counts edges from the root: the root is depth 0.
 */
export interface StructureInfo {
  totalNodes: number;       // every value, containers and scalars
  objectCount: number;
  arrayCount: number;
  stringCount: number;
  numberCount: number;
  booleanCount: number;
  nullCount: number;
  propertyCount: number;    // object members across the document
  arrayItemCount: number;   // array elements across the document
  maxDepth: number;
  maxArrayLength: number;
  totalStringLength: number;
  maxStringLength: number;
  byteSize: number;
  analyzedAt: string;       // ISO timestamp
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
  /** Nodes visited between event-loop yields */
  yieldEvery?: number;
}
