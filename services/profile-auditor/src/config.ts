import { z } from "zod";

export const decoderBackends = ["security", "openssl", "embedded"] as const;
export const reportFormats = ["text", "json"] as const;

export type DecoderBackend = (typeof decoderBackends)[number];
export type ReportFormat = (typeof reportFormats)[number];

export const auditConfigSchema = z.object({
  checkDir: z.string().min(1),
  workspaceDir: z.string().min(1),
  referenceDate: z.date().optional(),
  decoder: z.enum(decoderBackends),
  format: z.enum(reportFormats),
  sortArtifacts: z.boolean(),
});

export type AuditConfig = z.infer<typeof auditConfigSchema>;

const defaults: AuditConfig = {
  checkDir: "check",
  workspaceDir: "temp_extracted",
  decoder: "security",
  format: "text",
  sortArtifacts: false,
};

export const resolveConfig = (partial: Partial<AuditConfig> = {}): AuditConfig => {
  const merged: AuditConfig = {
    checkDir: partial.checkDir ?? defaults.checkDir,
    workspaceDir: partial.workspaceDir ?? defaults.workspaceDir,
    referenceDate: partial.referenceDate ?? defaults.referenceDate,
    decoder: partial.decoder ?? defaults.decoder,
    format: partial.format ?? defaults.format,
    sortArtifacts: partial.sortArtifacts ?? defaults.sortArtifacts,
  };

  return auditConfigSchema.parse(merged);
};

const isoDate = z
  .string()
  .transform((value, ctx) => {
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid reference date: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

const envSchema = z.object({
  AUDIT_CHECK_DIR: z.string().min(1).optional(),
  AUDIT_WORKSPACE_DIR: z.string().min(1).optional(),
  AUDIT_REFERENCE_DATE: isoDate.optional(),
  AUDIT_DECODER: z.enum(decoderBackends).optional(),
  AUDIT_FORMAT: z.enum(reportFormats).optional(),
  AUDIT_SORT: z.enum(["true", "false", "1", "0"]).optional(),
});

export const parseReferenceDate = (value: string): Date => isoDate.parse(value);

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<AuditConfig> {
  const parsed = envSchema.parse(env);
  const partial: Partial<AuditConfig> = {};
  if (parsed.AUDIT_CHECK_DIR) partial.checkDir = parsed.AUDIT_CHECK_DIR;
  if (parsed.AUDIT_WORKSPACE_DIR) partial.workspaceDir = parsed.AUDIT_WORKSPACE_DIR;
  if (parsed.AUDIT_REFERENCE_DATE) partial.referenceDate = parsed.AUDIT_REFERENCE_DATE;
  if (parsed.AUDIT_DECODER) partial.decoder = parsed.AUDIT_DECODER;
  if (parsed.AUDIT_FORMAT) partial.format = parsed.AUDIT_FORMAT;
  if (parsed.AUDIT_SORT) partial.sortArtifacts = parsed.AUDIT_SORT === "true" || parsed.AUDIT_SORT === "1";
  return partial;
}
