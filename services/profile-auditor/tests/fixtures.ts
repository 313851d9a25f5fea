import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import AdmZip from "adm-zip";

export function profilePlist(fields: Record<string, string> = {}): string {
  const body = Object.entries(fields)
    .map(([key, value]) => `\t<key>${key}</key>\n\t${value}`)
    .join("\n");
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
    '<plist version="1.0">',
    "<dict>",
    "\t<key>Name</key>",
    "\t<string>Test Profile</string>",
    body,
    "</dict>",
    "</plist>",
  ].join("\n");
}

export function expiringPlist(isoDate: string): string {
  return profilePlist({ ExpirationDate: `<date>${isoDate}</date>` });
}

const APPLE_EPOCH_MS = Date.UTC(2001, 0, 1);

/**
 * Encodes `{ ExpirationDate: <date> }` as a binary property list: a one-entry
 * dictionary, an ASCII key and a date object, with one-byte offsets and refs.
 */
export function binaryPlist(expiresAt: Date): Buffer {
  const key = Buffer.from("ExpirationDate", "ascii");
  const dict = Buffer.from([0xd1, 0x01, 0x02]);
  const keyObject = Buffer.concat([Buffer.from([0x50 | key.length]), key]);
  const dateObject = Buffer.alloc(9);
  dateObject.writeUInt8(0x33, 0);
  dateObject.writeDoubleBE((expiresAt.getTime() - APPLE_EPOCH_MS) / 1000, 1);

  const header = Buffer.from("bplist00", "ascii");
  const offsets = [header.length, header.length + dict.length, header.length + dict.length + keyObject.length];
  const offsetTableOffset = offsets[2] + dateObject.length;

  const trailer = Buffer.alloc(32);
  trailer.writeUInt8(1, 6);
  trailer.writeUInt8(1, 7);
  trailer.writeBigUInt64BE(3n, 8);
  trailer.writeBigUInt64BE(0n, 16);
  trailer.writeBigUInt64BE(BigInt(offsetTableOffset), 24);

  return Buffer.concat([header, dict, keyObject, dateObject, Buffer.from(offsets), trailer]);
}

/** Wraps a property list in filler bytes shaped like a DER signature envelope. */
export function signedContainer(payload: Buffer | string): Buffer {
  const header = Buffer.from([0x30, 0x82, 0x1f, 0x4a, 0x06, 0x09, 0x2a, 0x86, 0x48, 0x86, 0xf7, 0x0d, 0x01, 0x07, 0x02]);
  const trailer = Buffer.from([0xa0, 0x82, 0x0d, 0x3c, 0x30, 0x82, 0x04, 0x44, 0x00, 0x01]);
  const body = typeof payload === "string" ? Buffer.from(payload, "utf8") : payload;
  return Buffer.concat([header, body, trailer]);
}

export function buildArchive(entries: Record<string, Buffer | string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, typeof content === "string" ? Buffer.from(content, "utf8") : content);
  }
  return zip.toBuffer();
}

export async function makeSandbox(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "profile-audit-"));
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
