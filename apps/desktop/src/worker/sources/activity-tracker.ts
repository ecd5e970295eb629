import { resolveTimestamp } from "../../shared/time";
import type { ActivityPing } from "../../shared/types/signals";
import type { ActivitySource } from "./types";

export class ActivityTracker implements ActivitySource {
  private pending = false;

  private lastActivityAt: number | null = null;

  private pingCount = 0;

  record(ping: ActivityPing = {}, receivedAt?: number): void {
    this.pending = true;
    this.pingCount += 1;
    const timestamp = resolveTimestamp(ping.timestamp ?? receivedAt);
    if (this.lastActivityAt === null || timestamp > this.lastActivityAt) {
      this.lastActivityAt = timestamp;
    }
  }

  consumeActivity(): boolean {
    const observed = this.pending;
    this.pending = false;
    return observed;
  }

  peek(): boolean {
    return this.pending;
  }

  getLastActivityAt(): number | null {
    return this.lastActivityAt;
  }

  getPingCount(): number {
    return this.pingCount;
  }
}
