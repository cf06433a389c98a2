import type { HostState } from "../hosts/types.js";
import type { Message } from "./types.js";

/** "2026-03-04 09:05:00", in the given zone or local time. */
export function formatTimestamp(ms: number, timeZone?: string): string {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(new Date(ms));

  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return `${get("year")}-${get("month")}-${get("day")} ${get("hour")}:${get("minute")}:${get("second")}`;
}

export function renderCriticalAlert(host: string, failCount: number, now: number, timeZone?: string): Message {
  return {
    kind: "critical",
    subject: `CRITICAL: Host ${host} is DOWN`,
    body: [
      "Host Monitor Alert - CRITICAL",
      "",
      "The following host is currently unreachable:",
      `Host: ${host}`,
      `Time: ${formatTimestamp(now, timeZone)}`,
      `Failure count: ${failCount}`,
      "",
      "Please check the host immediately.",
      "",
    ].join("\n"),
  };
}

export function renderRecoveryAlert(host: string, failCount: number, now: number, timeZone?: string): Message {
  return {
    kind: "recovery",
    subject: `RECOVERED: Host ${host} is back online`,
    body: [
      "Host Monitor Alert - RECOVERY",
      "",
      "The following host has recovered and is now reachable:",
      `Host: ${host}`,
      `Time: ${formatTimestamp(now, timeZone)}`,
      `Total failures: ${failCount}`,
      "",
    ].join("\n"),
  };
}

export interface SummaryCounts {
  total: number;
  up: number;
  down: number;
}

export function countStates(states: HostState[]): SummaryCounts {
  const up = states.filter((s) => s.up).length;
  return { total: states.length, up, down: states.length - up };
}

export function renderSummary(states: HostState[], now: number, timeZone?: string): Message {
  const { total, up, down } = countStates(states);
  const stamp = formatTimestamp(now, timeZone);

  const detail = states.map((s) =>
    s.up
      ? `${s.host}: UP - Failures in last period: ${s.failCount}`
      : `${s.host}: DOWN - Current failure count: ${s.failCount}`
  );

  return {
    kind: "summary",
    subject: `Daily Host Status Report - ${stamp.slice(0, 10)}`,
    body: [
      "Host Monitor - Daily Status Report",
      "",
      `Report Time: ${stamp}`,
      "",
      "Host Status Summary:",
      `Total: ${total}, UP: ${up}, DOWN: ${down}`,
      "",
      "Detailed Status:",
      ...detail,
      "",
      "This is an automated report from Host Monitor.",
      "",
    ].join("\n"),
  };
}
