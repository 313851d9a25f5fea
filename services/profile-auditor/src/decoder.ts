import { spawn } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";

import { Logger } from "@nestjs/common";

import type { DecoderBackend } from "./config.js";
import { DecodeError, describeError } from "./errors.js";
import type { ProfileDecoder } from "./types.js";

export interface ProcessResult {
  exitCode: number;
  stderr: string;
}

export type ProcessRunner = (command: string, args: string[]) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (command, args) =>
  new Promise<ProcessResult>((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });
    const chunks: Buffer[] = [];
    proc.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));
    proc.on("error", reject);
    proc.on("close", (code) => resolve({ exitCode: code ?? 1, stderr: Buffer.concat(chunks).toString("utf8") }));
  });

export type CommandBuilder = (containerPath: string, outputPath: string) => [string, string[]];

export const securityCmsCommand: CommandBuilder = (containerPath, outputPath) => [
  "security",
  ["cms", "-D", "-i", containerPath, "-o", outputPath],
];

export const opensslSmimeCommand: CommandBuilder = (containerPath, outputPath) => [
  "openssl",
  ["smime", "-inform", "der", "-verify", "-noverify", "-in", containerPath, "-out", outputPath],
];

async function discard(outputPath: string): Promise<void> {
  await fs.rm(outputPath, { force: true });
}

/**
 * Strips the signature envelope by handing the container to a host tool.
 * Verification is never requested from the tool.
 */
export class ProcessDecoder implements ProfileDecoder {
  private readonly logger = new Logger(ProcessDecoder.name);

  constructor(
    private readonly command: CommandBuilder = securityCmsCommand,
    private readonly run: ProcessRunner = runProcess,
  ) {}

  async decode(containerPath: string, outputPath: string): Promise<void> {
    const [bin, args] = this.command(containerPath, outputPath);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    this.logger.debug(`Running ${bin} ${args.join(" ")}`);

    let result: ProcessResult;
    try {
      result = await this.run(bin, args);
    } catch (error) {
      await discard(outputPath);
      throw new DecodeError(containerPath, describeError(error));
    }

    if (result.exitCode !== 0) {
      await discard(outputPath);
      const diagnostic = result.stderr.trim() || `${bin} exited with code ${result.exitCode}`;
      throw new DecodeError(containerPath, diagnostic);
    }
  }
}

const XML_START = Buffer.from("<?xml");
const PLIST_END = Buffer.from("</plist>");
const BPLIST_MAGIC = Buffer.from("bplist00");
const BPLIST_TRAILER_SIZE = 32;

export function findEmbeddedPlist(container: Buffer): Buffer | undefined {
  return findXmlPlist(container) ?? findBinaryPlist(container);
}

function findXmlPlist(container: Buffer): Buffer | undefined {
  const start = container.indexOf(XML_START);
  if (start < 0) {
    return undefined;
  }
  const end = container.indexOf(PLIST_END, start);
  if (end < 0) {
    return undefined;
  }
  return container.subarray(start, end + PLIST_END.length);
}

/**
 * A binary property list carries no end marker, so the block ends at the
 * first offset whose preceding 32 bytes form a trailer describing exactly
 * the bytes in front of it.
 */
function findBinaryPlist(container: Buffer): Buffer | undefined {
  const start = container.indexOf(BPLIST_MAGIC);
  if (start < 0) {
    return undefined;
  }
  const smallest = BPLIST_MAGIC.length + 1 + 1 + BPLIST_TRAILER_SIZE;
  for (let length = smallest; start + length <= container.length; length++) {
    if (describesBlock(container.subarray(start + length - BPLIST_TRAILER_SIZE, start + length), length)) {
      return container.subarray(start, start + length);
    }
  }
  return undefined;
}

function describesBlock(trailer: Buffer, length: number): boolean {
  const offsetSize = trailer.readUInt8(6);
  const objectRefSize = trailer.readUInt8(7);
  if (offsetSize < 1 || offsetSize > 8 || objectRefSize < 1 || objectRefSize > 8) {
    return false;
  }
  const objectCount = trailer.readBigUInt64BE(8);
  const topObject = trailer.readBigUInt64BE(16);
  const offsetTableOffset = trailer.readBigUInt64BE(24);
  if (objectCount === 0n || topObject >= objectCount || offsetTableOffset < BigInt(BPLIST_MAGIC.length)) {
    return false;
  }
  return offsetTableOffset + objectCount * BigInt(offsetSize) + BigInt(BPLIST_TRAILER_SIZE) === BigInt(length);
}

/**
 * Reads the property list straight out of the DER envelope. The signed
 * content of a profile is stored unencrypted, so no host tool is needed.
 */
export class EmbeddedPlistDecoder implements ProfileDecoder {
  async decode(containerPath: string, outputPath: string): Promise<void> {
    let container: Buffer;
    try {
      container = await fs.readFile(containerPath);
    } catch (error) {
      throw new DecodeError(containerPath, describeError(error));
    }

    const payload = findEmbeddedPlist(container);
    if (!payload) {
      throw new DecodeError(containerPath, "No property list found in container");
    }

    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, payload);
    } catch (error) {
      await discard(outputPath);
      throw new DecodeError(containerPath, describeError(error));
    }
  }
}

export function createDecoder(backend: DecoderBackend, run: ProcessRunner = runProcess): ProfileDecoder {
  switch (backend) {
    case "security":
      return new ProcessDecoder(securityCmsCommand, run);
    case "openssl":
      return new ProcessDecoder(opensslSmimeCommand, run);
    case "embedded":
      return new EmbeddedPlistDecoder();
  }
}
