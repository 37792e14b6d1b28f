import { writeAudit, type AuditStage } from "./persistence";

export function logStage(traceId: string, stage: AuditStage, payload: Record<string, unknown>): void {
  writeAudit({
    trace_id: traceId,
    stage,
    payload,
    created_at: new Date().toISOString(),
  });
}

/** Shortens chat text for log lines. */
export function preview(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
