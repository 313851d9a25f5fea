import { promises as fs } from "node:fs";

import bplist from "bplist-parser";
import plist from "plist";

import { ParseError, describeError } from "./errors.js";
import type { DecodedProfile, ExpiryEvaluator, ExpiryVerdict } from "./types.js";

const BINARY_PLIST_MAGIC = "bplist";

function isDictionary(value: unknown): value is DecodedProfile {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    && !(value instanceof Date) && !Buffer.isBuffer(value);
}

export function parsePayload(buffer: Buffer, sourcePath: string): DecodedProfile {
  const isBinary = buffer.length >= 6 && buffer.subarray(0, 6).toString("utf8") === BINARY_PLIST_MAGIC;

  let root: unknown;
  try {
    if (isBinary) {
      const objects: unknown[] = bplist.parseBuffer(buffer);
      root = objects[0];
    } else {
      root = plist.parse(buffer.toString("utf8"));
    }
  } catch (error) {
    throw new ParseError(sourcePath, describeError(error));
  }

  if (!isDictionary(root)) {
    throw new ParseError(sourcePath, "Property list root is not a dictionary");
  }
  return root;
}

/** Compares at millisecond precision; an expiry equal to the reference is still valid. */
export function classifyExpiry(profile: DecodedProfile, referenceDate: Date): ExpiryVerdict {
  const expiration = profile.ExpirationDate;
  if (expiration === undefined || expiration === null) {
    return { status: "MISSING_DATE" };
  }
  if (!(expiration instanceof Date) || Number.isNaN(expiration.getTime())) {
    return { status: "PARSE_FAILED", detail: `ExpirationDate is not a date: ${String(expiration)}` };
  }

  const status = expiration.getTime() < referenceDate.getTime() ? "EXPIRED" : "VALID";
  return { status, expiresAt: expiration };
}

export class PlistExpiryEvaluator implements ExpiryEvaluator {
  async evaluate(payloadPath: string, referenceDate: Date): Promise<ExpiryVerdict> {
    try {
      const buffer = await fs.readFile(payloadPath);
      return classifyExpiry(parsePayload(buffer, payloadPath), referenceDate);
    } catch (error) {
      return { status: "PARSE_FAILED", detail: describeError(error) };
    }
  }
}
