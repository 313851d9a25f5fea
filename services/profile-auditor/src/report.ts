import { EMBEDDED_PROFILE_NAME } from "./archive.js";
import type { ReportFormat } from "./config.js";
import type { AuditEntry, ExpiryVerdict, VerdictSink, VerdictStatus } from "./types.js";

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

export function formatLine(artifactPath: string, verdict: ExpiryVerdict): string {
  switch (verdict.status) {
    case "VALID":
    case "EXPIRED":
      return `${artifactPath}: ${verdict.status} (Expires: ${verdict.expiresAt.toISOString()})`;
    case "MISSING_DATE":
      return `${artifactPath}: No expiration date found`;
    case "NOT_FOUND":
      return `${artifactPath}: No ${EMBEDDED_PROFILE_NAME} found`;
    case "DECODE_FAILED":
      return `${artifactPath}: Failed to decode - ${verdict.detail}`;
    case "EXTRACT_FAILED":
      return `${artifactPath}: Error extracting - ${verdict.detail}`;
    case "PARSE_FAILED":
      return `${artifactPath}: Error processing - ${verdict.detail}`;
  }
}

export function formatJsonLine(artifactPath: string, verdict: ExpiryVerdict): string {
  const record: Record<string, string> = { path: artifactPath, status: verdict.status };
  if ("expiresAt" in verdict) {
    record.expiresAt = verdict.expiresAt.toISOString();
  }
  if ("detail" in verdict) {
    record.detail = verdict.detail;
  }
  return JSON.stringify(record);
}

export class ReportSink implements VerdictSink {
  constructor(
    private readonly format: ReportFormat = "text",
    private readonly write: LineWriter = stdoutWriter,
  ) {}

  report(artifactPath: string, verdict: ExpiryVerdict): void {
    const line = this.format === "json" ? formatJsonLine(artifactPath, verdict) : formatLine(artifactPath, verdict);
    this.write(line);
  }
}

export function summarize(entries: AuditEntry[]): Partial<Record<VerdictStatus, number>> {
  const counts: Partial<Record<VerdictStatus, number>> = {};
  for (const { verdict } of entries) {
    counts[verdict.status] = (counts[verdict.status] ?? 0) + 1;
  }
  return counts;
}
