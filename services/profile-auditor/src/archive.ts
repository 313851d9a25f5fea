import path from "node:path";

import AdmZip from "adm-zip";

import { ExtractError, describeError } from "./errors.js";
import type { ExtractResult, ProfileExtractor } from "./types.js";

export const EMBEDDED_PROFILE_NAME = "embedded.mobileprovision";

/**
 * Pulls the embedded profile out of an application archive. When an archive
 * bundles several apps, the first matching entry in listing order is taken.
 */
export class ArchiveExtractor implements ProfileExtractor {
  async extractProfile(archivePath: string, workspaceDir: string): Promise<ExtractResult> {
    let zip: AdmZip;
    let entries: AdmZip.IZipEntry[];
    try {
      zip = new AdmZip(archivePath);
      entries = zip.getEntries();
    } catch (error) {
      throw new ExtractError(archivePath, describeError(error));
    }

    const entry = entries.find((item) => !item.isDirectory && item.entryName.endsWith(EMBEDDED_PROFILE_NAME));
    if (!entry) {
      return { found: false };
    }

    const target = path.resolve(workspaceDir, entry.entryName);
    if (!target.startsWith(path.resolve(workspaceDir) + path.sep)) {
      throw new ExtractError(archivePath, `Entry escapes the workspace: ${entry.entryName}`);
    }

    try {
      if (!zip.extractEntryTo(entry, workspaceDir, true, true)) {
        throw new Error(`Unable to extract ${entry.entryName}`);
      }
    } catch (error) {
      throw new ExtractError(archivePath, describeError(error));
    }

    return { found: true, path: target };
  }
}
