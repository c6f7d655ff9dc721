/**
 * Heartbeat Monitor — owner proof-of-life deadlines.
 *
 * Overdue status is a pure function of stored timestamps and the
 * current time. Nothing acts on it automatically.
 */

import type { UnixSeconds } from "@keepsake/types";
import type { HeartbeatStatus, Vault } from "./types.js";

const DAY = 24 * 60 * 60;

export const MIN_HEARTBEAT_INTERVAL = 30 * DAY;
export const MAX_HEARTBEAT_INTERVAL = 365 * DAY;

export function isValidHeartbeatInterval(interval: number): boolean {
  return (
    Number.isInteger(interval) &&
    interval >= MIN_HEARTBEAT_INTERVAL &&
    interval <= MAX_HEARTBEAT_INTERVAL
  );
}

export function isOverdue(vault: Vault, now: UnixSeconds): boolean {
  return vault.heartbeatEnabled && now > vault.lastHeartbeatAt + vault.heartbeatInterval;
}

export function heartbeatStatus(vault: Vault, now: UnixSeconds): HeartbeatStatus {
  if (!vault.heartbeatEnabled) {
    return {
      vaultId: vault.id,
      enabled: false,
      interval: vault.heartbeatInterval,
      lastHeartbeatAt: vault.lastHeartbeatAt,
      nextDeadline: null,
      overdue: false,
      secondsUntilDeadline: null,
    };
  }

  const nextDeadline = vault.lastHeartbeatAt + vault.heartbeatInterval;
  return {
    vaultId: vault.id,
    enabled: true,
    interval: vault.heartbeatInterval,
    lastHeartbeatAt: vault.lastHeartbeatAt,
    nextDeadline,
    overdue: now > nextDeadline,
    secondsUntilDeadline: nextDeadline - now,
  };
}
