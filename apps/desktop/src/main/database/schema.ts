import { integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";
import type { ScreenClassification } from "../../shared/types/signals";
import type { TimerState } from "../../shared/types/timer";

export const WORK_SESSIONS_TABLE = "work_sessions" as const;
export const APP_USAGE_TABLE = "app_usage" as const;
export const ACTIVITY_LOG_TABLE = "activity_log" as const;
export const SETTINGS_TABLE = "settings" as const;

// Instants are stored as epoch milliseconds.
export const workSessions = sqliteTable(WORK_SESSIONS_TABLE, {
  id: integer("id").primaryKey({ autoIncrement: true }),
  punchIn: integer("punch_in").notNull(),
  punchOut: integer("punch_out"),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
  totalProductiveSec: integer("total_productive_sec").notNull().default(0),
  totalUnproductiveSec: integer("total_unproductive_sec").notNull().default(0),
});

export type WorkSessionRow = typeof workSessions.$inferSelect;
export type NewWorkSessionRow = typeof workSessions.$inferInsert;

export const appUsage = sqliteTable(APP_USAGE_TABLE, {
  id: integer("id").primaryKey({ autoIncrement: true }),
  sessionId: integer("session_id").notNull(),
  appName: text("app_name").notNull(),
  windowTitle: text("window_title").notNull(),
  category: text("category").$type<ScreenClassification>().notNull(),
  productive: integer("productive", { mode: "boolean" }).notNull(),
  startTime: integer("start_time").notNull(),
  endTime: integer("end_time"),
  durationSec: integer("duration_sec"),
});

export type AppUsageRow = typeof appUsage.$inferSelect;
export type NewAppUsageRow = typeof appUsage.$inferInsert;

export const activityLog = sqliteTable(ACTIVITY_LOG_TABLE, {
  id: integer("id").primaryKey({ autoIncrement: true }),
  sessionId: integer("session_id").notNull(),
  timestamp: integer("timestamp").notNull(),
  facePresent: integer("face_present", { mode: "boolean" }).notNull(),
  inputActive: integer("input_active", { mode: "boolean" }).notNull(),
  screenCategory: text("screen_category").$type<ScreenClassification>().notNull(),
  productive: integer("productive", { mode: "boolean" }).notNull(),
  timerState: text("timer_state").$type<TimerState>().notNull(),
  elapsedProductiveSec: real("elapsed_productive_sec").notNull(),
});

export type ActivityLogRow = typeof activityLog.$inferSelect;
export type NewActivityLogRow = typeof activityLog.$inferInsert;

export const settings = sqliteTable(SETTINGS_TABLE, {
  key: text("key").primaryKey().notNull(),
  value: text("value").notNull(),
});

export type SettingRow = typeof settings.$inferSelect;
export type NewSettingRow = typeof settings.$inferInsert;

export const schema = {
  workSessions,
  appUsage,
  activityLog,
  settings,
};
