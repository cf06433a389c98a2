// --- Host State ---

export interface HostState {
  host: string;
  up: boolean;
  /** Consecutive failed probe cycles; 0 whenever `up`. */
  failCount: number;
  /** Epoch ms of the last CRITICAL alert, null before the first one. */
  lastAlertAt: number | null;
}

export type HostStatus = "up" | "down";

export function statusOf(state: HostState): HostStatus {
  return state.up ? "up" : "down";
}
