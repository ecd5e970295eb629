import { and, eq, isNull } from "drizzle-orm";
import type { ScreenClassification } from "../../shared/types/signals";
import { getDatabase } from "./client";
import { type AppUsageRow, appUsage } from "./schema";

export type AppUsageStart = {
  sessionId: number;
  appName: string;
  windowTitle: string;
  category: ScreenClassification;
  productive: boolean;
  startedAt?: number;
};

export const logAppStart = ({
  sessionId,
  appName,
  windowTitle,
  category,
  productive,
  startedAt = Date.now(),
}: AppUsageStart): number => {
  const db = getDatabase();
  const row = db
    .insert(appUsage)
    .values({
      sessionId,
      appName,
      windowTitle,
      category,
      productive,
      startTime: startedAt,
    })
    .returning({ id: appUsage.id })
    .get();
  return row.id;
};

/**
 * Closes a usage row. Unknown or already-closed rows are left untouched and
 * yield null.
 */
export const logAppEnd = (
  usageId: number,
  endedAt: number = Date.now(),
): AppUsageRow | null => {
  const db = getDatabase();
  const existing = db
    .select({ startTime: appUsage.startTime })
    .from(appUsage)
    .where(and(eq(appUsage.id, usageId), isNull(appUsage.endTime)))
    .get();

  if (!existing) {
    return null;
  }

  const durationSec = Math.max(
    0,
    Math.floor((endedAt - existing.startTime) / 1000),
  );

  const row = db
    .update(appUsage)
    .set({ endTime: endedAt, durationSec })
    .where(eq(appUsage.id, usageId))
    .returning()
    .get();

  return row ?? null;
};

export const listAppUsageForSession = (sessionId: number): AppUsageRow[] => {
  const db = getDatabase();
  return db
    .select()
    .from(appUsage)
    .where(eq(appUsage.sessionId, sessionId))
    .orderBy(appUsage.startTime, appUsage.id)
    .all();
};
