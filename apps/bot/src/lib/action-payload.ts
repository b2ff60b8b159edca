import type { JobId, RunId } from "./remote-job-client.js";

export const ACTION_NAMES = ["check_status", "repair", "pause", "resume"] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export type ActionPayload =
  | { action: "check_status"; jobId: JobId }
  | { action: "repair"; runId: RunId }
  | { action: "pause"; jobId: JobId }
  | { action: "resume"; jobId: JobId };

export type DecodeActionResult = { ok: true; payload: ActionPayload } | { ok: false; reason: string };

// Telegram rejects callback data longer than 64 bytes.
export const MAX_CALLBACK_DATA_BYTES = 64;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readTargetId(value: unknown): number | null {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0 ? value : null;
}

function isActionName(value: unknown): value is ActionName {
  return typeof value === "string" && ACTION_NAMES.some((name) => name === value);
}

export function encodeActionPayload(payload: ActionPayload): string {
  switch (payload.action) {
    case "repair":
      return JSON.stringify({ action: payload.action, run_id: payload.runId });
    case "check_status":
    case "pause":
    case "resume":
      return JSON.stringify({ action: payload.action, job_id: payload.jobId });
  }
}

export function decodeActionPayload(data: string | undefined | null): DecodeActionResult {
  if (!data) {
    return { ok: false, reason: "empty payload" };
  }

  if (Buffer.byteLength(data, "utf8") > MAX_CALLBACK_DATA_BYTES) {
    return { ok: false, reason: "payload too long" };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return { ok: false, reason: "payload is not JSON" };
  }

  if (!isRecord(raw)) {
    return { ok: false, reason: "payload is not an object" };
  }

  if (!isActionName(raw.action)) {
    return { ok: false, reason: `unknown action: ${String(raw.action)}` };
  }

  if (raw.action === "repair") {
    const runId = readTargetId(raw.run_id);
    return runId === null
      ? { ok: false, reason: "repair requires a numeric run_id" }
      : { ok: true, payload: { action: "repair", runId } };
  }

  const jobId = readTargetId(raw.job_id);
  if (jobId === null) {
    return { ok: false, reason: `${raw.action} requires a numeric job_id` };
  }

  return { ok: true, payload: { action: raw.action, jobId } };
}
