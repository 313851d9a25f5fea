#!/usr/bin/env node
import "reflect-metadata";

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { AnalysisLauncher } from "./launcher.js";

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
  new AnalysisLauncher()
    .launch(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
