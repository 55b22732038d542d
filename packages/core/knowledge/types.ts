import type { CheckpointType } from "../trip/types";

/** One short accessibility-guidance passage. Loaded once, never mutated. */
export interface GuidancePassage {
  id: string;
  text: string;
  /** Checkpoint types the passage applies to; empty means all */
  checkpointTypes: readonly CheckpointType[];
  tags: readonly string[];
  /** Normalized station keys the passage is specific to; absent means any station */
  stations?: readonly string[];
}

export interface ScoredPassage {
  passage: GuidancePassage;
  score: number;
}

export interface RetrievalQuery {
  checkpointType: CheckpointType;
  /** Salient facility attributes, e.g. "엘리베이터 3번 출구 경사로" */
  context: string;
  station?: string;
}

export type RetrievalOutcome =
  | { status: "ok"; passages: ScoredPassage[] }
  | { status: "unavailable"; reason: string; passages: [] };
