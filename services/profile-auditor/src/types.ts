export type ArtifactKind = "StandaloneProfile" | "ArchiveEmbedded";

export interface ProvisioningArtifact {
  path: string;
  kind: ArtifactKind;
}

export type VerdictStatus =
  | "VALID"
  | "EXPIRED"
  | "MISSING_DATE"
  | "NOT_FOUND"
  | "DECODE_FAILED"
  | "EXTRACT_FAILED"
  | "PARSE_FAILED";

export type ExpiryVerdict =
  | { readonly status: "VALID" | "EXPIRED"; readonly expiresAt: Date }
  | { readonly status: "MISSING_DATE" | "NOT_FOUND" }
  | { readonly status: "DECODE_FAILED" | "EXTRACT_FAILED" | "PARSE_FAILED"; readonly detail: string };

export interface AuditEntry {
  artifact: ProvisioningArtifact;
  verdict: ExpiryVerdict;
}

/** Key/value payload recovered from a profile's signature envelope. */
export type DecodedProfile = Record<string, unknown>;

export type ExtractResult = { found: true; path: string } | { found: false };

export interface ProfileDecoder {
  decode(containerPath: string, outputPath: string): Promise<void>;
}

export interface ProfileExtractor {
  extractProfile(archivePath: string, workspaceDir: string): Promise<ExtractResult>;
}

export interface ExpiryEvaluator {
  evaluate(payloadPath: string, referenceDate: Date): Promise<ExpiryVerdict>;
}

export interface VerdictSink {
  report(artifactPath: string, verdict: ExpiryVerdict): void;
}

export type Clock = () => Date;
