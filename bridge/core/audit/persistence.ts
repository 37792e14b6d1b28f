export type AuditStage = "event" | "command" | "persona" | "submit" | "response" | "outbound" | "error";

export interface AuditRecord {
  trace_id: string;
  stage: AuditStage;
  payload: Record<string, unknown>;
  created_at: string;
}

const MAX_RECORDS = Number(process.env.MAX_AUDIT_RECORDS) || 2000;

const records: AuditRecord[] = [];

export function writeAudit(record: AuditRecord): void {
  records.push(record);
  if (records.length > MAX_RECORDS) {
    records.splice(0, records.length - MAX_RECORDS);
  }
}

export function listAuditByTrace(traceId: string): AuditRecord[] {
  return records.filter((r) => r.trace_id === traceId);
}

export function __resetAuditForTest(): void {
  records.length = 0;
}
