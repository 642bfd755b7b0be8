import { ActionCounts, DateKey, RECONCILE_ACTIONS } from "./dto";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

/** UTC calendar date of `date` */
export function toDateKey(date: Date): DateKey {
  return date.toISOString().slice(0, 10);
}

/** `YYYYMMDD-HHMMSS` in UTC, used in job ids */
export function toJobStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}-${iso
    .slice(11, 19)
    .replace(/:/g, "")}`;
}

export function emptyActionCounts(): ActionCounts {
  return {
    new: 0,
    price_change: 0,
    republished: 0,
    active: 0,
    skipped: 0,
  };
}

export function addActionCounts(
  into: ActionCounts,
  from: ActionCounts
): ActionCounts {
  for (const action of RECONCILE_ACTIONS) {
    into[action] += from[action];
  }
  return into;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
