/**
 * CHECKPOINT STATE MACHINE
 *
 * A TripSession owns the current checkpoint index of one trip.
 *
 * Transitions:
 * - GPS: only toward the next checkpoint, only if it has coordinates, and
 *   only when the rider is within its radius
 * - signal: a timer expiry or rider action moves to the next checkpoint;
 *   platform-wait and boarding can only advance this way
 *
 * The index never decreases and the session ends at the last checkpoint.
 */

import { compassDirection, haversineMeters, isWithinRadius, type CompassDirection } from "./geo";
import type { AdvanceSignal, Checkpoint, GeoPoint, TripContext } from "./types";

export type TransitionTrigger = "gps" | AdvanceSignal;

export type AdvanceOutcome =
  | { status: "advanced"; checkpoint: Checkpoint; trigger: TransitionTrigger; complete: boolean }
  | { status: "complete" };

export type PositionOutcome =
  | AdvanceOutcome
  | {
      status: "approaching";
      next: Checkpoint;
      distanceMeters: number;
      direction: CompassDirection;
    }
  | { status: "awaiting_signal"; next: Checkpoint };

export interface TripSessionInit {
  id: string;
  riderKey: string | null;
  createdAt: number;
  checkpoints: readonly Checkpoint[];
  context: TripContext;
}

export class TripSession {
  readonly id: string;
  readonly riderKey: string | null;
  readonly createdAt: number;
  readonly checkpoints: readonly Checkpoint[];
  readonly context: TripContext;

  private index = 0;

  constructor(init: TripSessionInit) {
    if (init.checkpoints.length === 0) {
      throw new Error("A trip needs at least one checkpoint");
    }
    init.checkpoints.forEach((checkpoint, i) => {
      if (checkpoint.id !== i) {
        throw new Error(`Checkpoint ids must be 0..n-1 in order (got ${checkpoint.id} at ${i})`);
      }
    });

    this.id = init.id;
    this.riderKey = init.riderKey;
    this.createdAt = init.createdAt;
    this.checkpoints = init.checkpoints;
    this.context = init.context;
  }

  get currentIndex(): number {
    return this.index;
  }

  get current(): Checkpoint {
    return this.checkpoints[this.index];
  }

  get next(): Checkpoint | undefined {
    return this.checkpoints[this.index + 1];
  }

  get isComplete(): boolean {
    return this.index === this.checkpoints.length - 1;
  }

  checkpoint(id: number): Checkpoint | undefined {
    return this.checkpoints[id];
  }

  reportPosition(position: GeoPoint): PositionOutcome {
    const next = this.next;
    if (!next) return { status: "complete" };
    if (!next.gps) return { status: "awaiting_signal", next };

    if (isWithinRadius(position, next.gps, next.radiusMeters)) {
      return this.moveTo(next, "gps");
    }

    return {
      status: "approaching",
      next,
      distanceMeters: Math.round(haversineMeters(position, next.gps)),
      direction: compassDirection(position, next.gps),
    };
  }

  advance(signal: AdvanceSignal): AdvanceOutcome {
    const next = this.next;
    if (!next) return { status: "complete" };
    return this.moveTo(next, signal);
  }

  private moveTo(checkpoint: Checkpoint, trigger: TransitionTrigger): AdvanceOutcome {
    this.index = checkpoint.id;
    return { status: "advanced", checkpoint, trigger, complete: this.isComplete };
  }
}
