#!/usr/bin/env node
import "reflect-metadata";

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { Logger } from "@nestjs/common";
import { ZodError } from "zod";

import { AuditRunner, type AuditCollaborators } from "./auditRunner.js";
import {
  type AuditConfig,
  decoderBackends,
  loadConfigFromEnv,
  parseReferenceDate,
  reportFormats,
  resolveConfig,
} from "./config.js";
import { describeError } from "./errors.js";
import { installLogger } from "./logger.js";

const USAGE =
  "Usage: profile-auditor [dir] [--workspace <dir>] [--reference-date <iso>] " +
  `[--decoder ${decoderBackends.join("|")}] [--format ${reportFormats.join("|")}] [--sort]`;

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

export function parseArgs(args: string[]): Partial<AuditConfig> {
  const partial: Partial<AuditConfig> = {};
  const takeValue = (index: number, flag: string): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${flag}. ${USAGE}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case "--workspace":
        partial.workspaceDir = takeValue(i, arg);
        i += 1;
        break;
      case "--reference-date":
        partial.referenceDate = parseReferenceDate(takeValue(i, arg));
        i += 1;
        break;
      case "--decoder": {
        const value = takeValue(i, arg);
        if (!isOneOf(decoderBackends, value)) {
          throw new Error(`Unknown decoder: ${value}. ${USAGE}`);
        }
        partial.decoder = value;
        i += 1;
        break;
      }
      case "--format": {
        const value = takeValue(i, arg);
        if (!isOneOf(reportFormats, value)) {
          throw new Error(`Unknown format: ${value}. ${USAGE}`);
        }
        partial.format = value;
        i += 1;
        break;
      }
      case "--sort":
        partial.sortArtifacts = true;
        break;
      default:
        if (arg.startsWith("--") || partial.checkDir !== undefined) {
          throw new Error(`Unexpected argument: ${arg}. ${USAGE}`);
        }
        partial.checkDir = arg;
    }
  }
  return partial;
}

function formatFailure(error: unknown): string {
  if (error instanceof ZodError) {
    return `Invalid configuration: ${error.issues.map((issue) => issue.message).join("; ")}`;
  }
  return describeError(error);
}

/** Returns the process exit status: 0 once the batch completed, 1 on a fatal error. */
export const bootstrap = async (
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  collaborators: Partial<AuditCollaborators> = {},
): Promise<number> => {
  const logger = new Logger("ProfileAuditor");
  try {
    const config = resolveConfig({ ...loadConfigFromEnv(env), ...parseArgs(args) });
    await new AuditRunner(config, collaborators).run();
    return 0;
  } catch (error) {
    logger.error(formatFailure(error));
    return 1;
  }
};

/** True when this module was started as the program, directly or through a bin link. */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (scriptPath === undefined) {
    return false;
  }
  try {
    return realpathSync(fileURLToPath(moduleUrl)) === realpathSync(scriptPath);
  } catch {
    return false;
  }
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  installLogger();
  bootstrap(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
