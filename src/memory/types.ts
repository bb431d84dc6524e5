// Corrections remembered from past disagreements. The key is what similarity
// is computed against; everything else rides along for the proposer.

export interface MemoryRecord {
  readonly key: string;               // Event text, or event text + state summary
  readonly sourceText: string;        // Original event text
  readonly stateSnapshot: string;     // Subject state summary when the correction was made
  readonly correctionReasoning: string;
  readonly correctionPlan: string;    // Plan label of the authoritative decision
  readonly tag: string;               // Persona / category label
}

export interface SearchResult {
  record: MemoryRecord;
  similarity: number;   // Cosine similarity, 1 for an identical key
  position: number;     // Insertion index, used to break ties
}

export interface SearchOptions {
  topK: number;
  minSimilarity: number;
}

// Snapshot shape on disk. Older snapshots carry only state/reasoning/plan/persona.
export interface PersistedRecord {
  state: string;
  comment: string;
  stateMetrics: string;
  reasoning: string;
  plan: string;
  persona: string;
}

export type SimilarityBackendKind = 'lexical' | 'embedding';
