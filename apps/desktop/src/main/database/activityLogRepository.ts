import { eq } from "drizzle-orm";
import type { TickReport } from "../../shared/types/timer";
import { getDatabase } from "./client";
import { type ActivityLogRow, activityLog } from "./schema";

export const logActivity = (sessionId: number, report: TickReport): void => {
  const db = getDatabase();
  db.insert(activityLog)
    .values({
      sessionId,
      timestamp: report.timestamp,
      facePresent: report.signals.focused,
      inputActive: report.signals.activity,
      screenCategory: report.signals.classification,
      productive: report.verdict,
      timerState: report.timer.state,
      elapsedProductiveSec: report.timer.elapsedProductiveSeconds,
    })
    .run();
};

export const listActivityForSession = (sessionId: number): ActivityLogRow[] => {
  const db = getDatabase();
  return db
    .select()
    .from(activityLog)
    .where(eq(activityLog.sessionId, sessionId))
    .orderBy(activityLog.timestamp, activityLog.id)
    .all();
};
