/**
 * In-memory trip sessions, keyed by trip id.
 *
 * Sessions live 24 hours. A new search by the same rider replaces that
 * rider's earlier trip.
 */

import { randomUUID } from "crypto";
import { TripNotFound } from "../errors";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import { TripSession } from "./state-machine";
import type { Checkpoint, TripContext } from "./types";

export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;

export interface TripSessionStoreOptions {
  ttlMs?: number;
  clock?: () => number;
  generateId?: () => string;
  logger?: Logger;
}

export interface NewTrip {
  riderKey?: string | null;
  checkpoints: readonly Checkpoint[];
  context: TripContext;
}

export class TripSessionStore {
  private readonly sessions = new Map<string, TripSession>();
  private readonly byRider = new Map<string, string>();
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private readonly generateId: () => string;
  private readonly logger: Logger;

  constructor(options: TripSessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? SESSION_TTL_MS;
    this.clock = options.clock ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
    this.logger = options.logger ?? silentLogger;
  }

  create(trip: NewTrip): TripSession {
    const riderKey = trip.riderKey ?? null;
    if (riderKey) {
      const previous = this.byRider.get(riderKey);
      if (previous) {
        this.remove(previous);
        this.logger.info(`Trip ${previous} superseded by a new search`);
      }
    }

    const session = new TripSession({
      id: this.generateId(),
      riderKey,
      createdAt: this.clock(),
      checkpoints: trip.checkpoints,
      context: trip.context,
    });

    this.sessions.set(session.id, session);
    if (riderKey) this.byRider.set(riderKey, session.id);
    return session;
  }

  /** Throws TripNotFound for unknown, ended or expired trips */
  get(id: string): TripSession {
    const session = this.sessions.get(id);
    if (!session) throw new TripNotFound(id);
    if (this.isExpired(session)) {
      this.remove(id);
      throw new TripNotFound(id);
    }
    return session;
  }

  remove(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.sessions.delete(id);
    if (session.riderKey && this.byRider.get(session.riderKey) === id) {
      this.byRider.delete(session.riderKey);
    }
    return true;
  }

  cleanupExpired(): number {
    let removed = 0;
    for (const session of Array.from(this.sessions.values())) {
      if (this.isExpired(session)) {
        this.remove(session.id);
        removed++;
      }
    }
    if (removed > 0) this.logger.info(`Removed ${removed} expired trips`);
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: TripSession): boolean {
    return this.clock() >= session.createdAt + this.ttlMs;
  }
}
