import type { Dirent } from "node:fs";
import { promises as fs } from "node:fs";
import path from "node:path";

import { Logger } from "@nestjs/common";

import { ArchiveExtractor } from "./archive.js";
import type { AuditConfig } from "./config.js";
import { createDecoder } from "./decoder.js";
import { OrchestrationFatal, describeError } from "./errors.js";
import { PlistExpiryEvaluator } from "./evaluator.js";
import { ReportSink, summarize } from "./report.js";
import type {
  ArtifactKind,
  AuditEntry,
  Clock,
  ExpiryEvaluator,
  ExpiryVerdict,
  ProfileDecoder,
  ProfileExtractor,
  ProvisioningArtifact,
  VerdictSink,
} from "./types.js";

export const PROFILE_EXTENSION = ".mobileprovision";
export const ARCHIVE_EXTENSION = ".ipa";

export interface AuditCollaborators {
  decoder: ProfileDecoder;
  extractor: ProfileExtractor;
  evaluator: ExpiryEvaluator;
  sink: VerdictSink;
  clock: Clock;
}

export function classifyArtifact(fileName: string): ArtifactKind | undefined {
  if (fileName.endsWith(PROFILE_EXTENSION)) {
    return "StandaloneProfile";
  }
  if (fileName.endsWith(ARCHIVE_EXTENSION)) {
    return "ArchiveEmbedded";
  }
  return undefined;
}

export class AuditRunner {
  private readonly logger = new Logger(AuditRunner.name);
  private readonly collaborators: AuditCollaborators;

  constructor(
    private readonly config: AuditConfig,
    collaborators: Partial<AuditCollaborators> = {},
  ) {
    this.collaborators = {
      decoder: collaborators.decoder ?? createDecoder(config.decoder),
      extractor: collaborators.extractor ?? new ArchiveExtractor(),
      evaluator: collaborators.evaluator ?? new PlistExpiryEvaluator(),
      sink: collaborators.sink ?? new ReportSink(config.format),
      clock: collaborators.clock ?? (() => new Date()),
    };
  }

  async run(inputDir: string = this.config.checkDir): Promise<AuditEntry[]> {
    const referenceDate = this.config.referenceDate ?? this.collaborators.clock();
    const artifacts = await this.discover(inputDir);
    this.logger.log(`Auditing ${artifacts.length} artifact(s) in ${inputDir} against ${referenceDate.toISOString()}`);

    const workspace = this.config.workspaceDir;
    await this.prepareWorkspace(workspace);

    const entries: AuditEntry[] = [];
    let completed = false;
    try {
      for (const [index, artifact] of artifacts.entries()) {
        const verdict = Object.freeze(await this.check(artifact, index, workspace, referenceDate));
        entries.push({ artifact, verdict });
      }
      completed = true;
    } finally {
      await this.releaseWorkspace(workspace, completed);
    }

    // Nothing is reported until teardown has succeeded; a fatal run prints no verdicts.
    for (const { artifact, verdict } of entries) {
      this.collaborators.sink.report(artifact.path, verdict);
    }

    this.logger.log(`Audit finished: ${JSON.stringify(summarize(entries))}`);
    return entries;
  }

  async discover(inputDir: string): Promise<ProvisioningArtifact[]> {
    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(inputDir, { withFileTypes: true });
    } catch (error) {
      throw new OrchestrationFatal(inputDir, `Unable to read input directory: ${describeError(error)}`);
    }

    const artifacts: ProvisioningArtifact[] = [];
    for (const dirent of dirents) {
      const kind = dirent.isFile() ? classifyArtifact(dirent.name) : undefined;
      if (!kind) {
        continue;
      }
      artifacts.push({ path: path.join(inputDir, dirent.name), kind });
    }

    if (this.config.sortArtifacts) {
      artifacts.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    }
    return artifacts;
  }

  private async check(
    artifact: ProvisioningArtifact,
    index: number,
    workspace: string,
    referenceDate: Date,
  ): Promise<ExpiryVerdict> {
    const slot = path.join(workspace, String(index));

    if (artifact.kind === "StandaloneProfile") {
      return this.decodeAndEvaluate(artifact.path, slot, referenceDate);
    }

    let containerPath: string;
    try {
      const extracted = await this.collaborators.extractor.extractProfile(artifact.path, path.join(slot, "archive"));
      if (!extracted.found) {
        return { status: "NOT_FOUND" };
      }
      containerPath = extracted.path;
    } catch (error) {
      this.logger.warn(`Extraction failed for ${artifact.path}: ${describeError(error)}`);
      return { status: "EXTRACT_FAILED", detail: describeError(error) };
    }

    return this.decodeAndEvaluate(containerPath, slot, referenceDate);
  }

  private async decodeAndEvaluate(containerPath: string, slot: string, referenceDate: Date): Promise<ExpiryVerdict> {
    const payloadPath = path.join(slot, "profile.plist");
    try {
      try {
        await this.collaborators.decoder.decode(containerPath, payloadPath);
      } catch (error) {
        this.logger.warn(`Decoding failed for ${containerPath}: ${describeError(error)}`);
        return { status: "DECODE_FAILED", detail: describeError(error) };
      }
      try {
        return await this.collaborators.evaluator.evaluate(payloadPath, referenceDate);
      } catch (error) {
        return { status: "PARSE_FAILED", detail: describeError(error) };
      }
    } finally {
      await this.discardPayload(payloadPath);
    }
  }

  private async discardPayload(payloadPath: string): Promise<void> {
    try {
      await fs.rm(payloadPath, { force: true });
    } catch (error) {
      this.logger.warn(`Unable to remove decoded payload ${payloadPath}: ${describeError(error)}`);
    }
  }

  private async prepareWorkspace(workspace: string): Promise<void> {
    try {
      await fs.rm(workspace, { recursive: true, force: true });
      await fs.mkdir(workspace, { recursive: true });
    } catch (error) {
      throw new OrchestrationFatal(workspace, `Unable to prepare workspace: ${describeError(error)}`);
    }
  }

  private async releaseWorkspace(workspace: string, completed: boolean): Promise<void> {
    try {
      await fs.rm(workspace, { recursive: true, force: true });
    } catch (error) {
      if (completed) {
        throw new OrchestrationFatal(workspace, `Unable to remove workspace: ${describeError(error)}`);
      }
      this.logger.error(`Unable to remove workspace ${workspace}: ${describeError(error)}`);
    }
  }
}
