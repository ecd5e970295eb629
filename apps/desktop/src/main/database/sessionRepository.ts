import { desc, eq, sql } from "drizzle-orm";
import { getLogger } from "../../shared/logger";
import { getDatabase } from "./client";
import { type WorkSessionRow, workSessions } from "./schema";

const logger = getLogger("session-repository", "main");

export type WorkSessionSummary = {
  id: number;
  punchIn: number;
  punchOut: number | null;
  isActive: boolean;
  totalProductiveSec: number;
  totalUnproductiveSec: number;
};

const mapRowToSummary = (row: WorkSessionRow): WorkSessionSummary => ({
  id: row.id,
  punchIn: row.punchIn,
  punchOut: row.punchOut,
  isActive: row.isActive,
  totalProductiveSec: row.totalProductiveSec,
  totalUnproductiveSec: row.totalUnproductiveSec,
});

/**
 * Punch in. Any session still marked active (left over from a crash) is
 * closed at `now` first, so at most one session is ever active.
 */
export const startSession = (now: number = Date.now()): WorkSessionSummary => {
  const db = getDatabase();

  return db.transaction((tx) => {
    const closed = tx
      .update(workSessions)
      .set({ isActive: false, punchOut: now })
      .where(eq(workSessions.isActive, true))
      .returning({ id: workSessions.id })
      .all();

    if (closed.length > 0) {
      logger.warn("Closed sessions left active by a previous run", {
        sessionIds: closed.map((row) => row.id),
      });
    }

    const row = tx
      .insert(workSessions)
      .values({ punchIn: now, isActive: true })
      .returning()
      .get();

    return mapRowToSummary(row);
  });
};

export const endSession = (
  sessionId: number,
  now: number = Date.now(),
): WorkSessionSummary | null => {
  const db = getDatabase();
  const row = db
    .update(workSessions)
    .set({ isActive: false, punchOut: now })
    .where(eq(workSessions.id, sessionId))
    .returning()
    .get();

  return row ? mapRowToSummary(row) : null;
};

/** Adds whole-second deltas to the session counters. */
export const addSessionProductivity = (
  sessionId: number,
  productiveDeltaSec: number,
  unproductiveDeltaSec: number,
): void => {
  const productive = Math.max(0, Math.trunc(productiveDeltaSec));
  const unproductive = Math.max(0, Math.trunc(unproductiveDeltaSec));
  if (productive === 0 && unproductive === 0) {
    return;
  }

  const db = getDatabase();
  db.update(workSessions)
    .set({
      totalProductiveSec: sql`${workSessions.totalProductiveSec} + ${productive}`,
      totalUnproductiveSec: sql`${workSessions.totalUnproductiveSec} + ${unproductive}`,
    })
    .where(eq(workSessions.id, sessionId))
    .run();
};

export const getSession = (sessionId: number): WorkSessionSummary | null => {
  const db = getDatabase();
  const row = db
    .select()
    .from(workSessions)
    .where(eq(workSessions.id, sessionId))
    .get();
  return row ? mapRowToSummary(row) : null;
};

export const getActiveSession = (): WorkSessionSummary | null => {
  const db = getDatabase();
  const row = db
    .select()
    .from(workSessions)
    .where(eq(workSessions.isActive, true))
    .orderBy(desc(workSessions.punchIn))
    .get();
  return row ? mapRowToSummary(row) : null;
};

export const listRecentSessions = (limit = 10): WorkSessionSummary[] => {
  const db = getDatabase();
  return db
    .select()
    .from(workSessions)
    .orderBy(desc(workSessions.punchIn), desc(workSessions.id))
    .limit(Math.max(1, Math.trunc(limit)))
    .all()
    .map(mapRowToSummary);
};
