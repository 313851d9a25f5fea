import { spawn } from "node:child_process";
import { constants, promises as fs } from "node:fs";
import path from "node:path";

import { Logger } from "@nestjs/common";
import { z } from "zod";

export const languages = ["swift", "cpp", "all"] as const;
export const modes = ["basic", "advanced"] as const;

export type Language = (typeof languages)[number];
export type Mode = (typeof modes)[number];

export const USAGE = "Usage: analyze /path/to/code [swift|cpp|all] [basic|advanced]";

const CPP_EXTENSIONS = [".cpp", ".cxx", ".cc"];

const requestSchema = z.object({
  codePath: z.string().min(1),
  language: z.enum(languages, {
    errorMap: () => ({ message: "Invalid language specified. Use 'swift', 'cpp', or 'all'." }),
  }),
  mode: z.enum(modes, {
    errorMap: () => ({ message: "Invalid mode specified. Use 'basic' or 'advanced'." }),
  }),
});

export type AnalysisRequest = z.infer<typeof requestSchema>;

export interface ToolInvocation {
  tool: string;
  command: string;
  args: string[];
}

export interface ToolHost {
  exists(command: string): Promise<boolean>;
  run(command: string, args: string[]): Promise<number>;
  listFiles(dir: string): Promise<string[]>;
  pathExists(target: string): Promise<boolean>;
}

export type Printer = (line: string) => void;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseRequest(args: string[]): AnalysisRequest {
  if (args.length < 1 || args.length > 3) {
    throw new UsageError(USAGE);
  }
  const parsed = requestSchema.safeParse({
    codePath: args[0],
    language: args[1] ?? "all",
    mode: args[2] ?? "basic",
  });
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues[0]?.message ?? USAGE);
  }
  return parsed.data;
}

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export const systemHost: ToolHost = {
  async exists(command) {
    const dirs = (process.env.PATH ?? "").split(path.delimiter).filter(Boolean);
    for (const dir of dirs) {
      if (await isExecutable(path.join(dir, command))) {
        return true;
      }
    }
    return false;
  },
  run(command, args) {
    return new Promise<number>((resolve, reject) => {
      const proc = spawn(command, args, { stdio: "inherit" });
      proc.on("error", reject);
      proc.on("close", (code) => resolve(code ?? 1));
    });
  },
  async listFiles(dir) {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  },
  async pathExists(target) {
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  },
};

export class AnalysisLauncher {
  private readonly logger = new Logger(AnalysisLauncher.name);

  constructor(
    private readonly host: ToolHost = systemHost,
    private readonly print: Printer = (line) => console.log(line),
  ) {}

  async plan(request: AnalysisRequest): Promise<ToolInvocation[]> {
    const { codePath, language, mode } = request;
    const invocations: ToolInvocation[] = [];

    if (language === "swift" || language === "all") {
      invocations.push({ tool: "SwiftLint", command: "swiftlint", args: ["lint", codePath] });
    }
    if (language === "cpp" || language === "all") {
      invocations.push({ tool: "Cppcheck", command: "cppcheck", args: [codePath] });
    }

    if (mode === "advanced") {
      if (language === "cpp" || language === "all") {
        const cppFiles = await this.listCppFiles(codePath);
        if (cppFiles.length > 0) {
          invocations.push({
            tool: "Clang-Tidy",
            command: "clang-tidy",
            args: ["--quiet", ...cppFiles, "--", `-I${codePath}`],
          });
        } else {
          this.print("No C++ files found for Clang-Tidy.");
        }
      }
      invocations.push({ tool: "Infer", command: "infer", args: ["run", "--", "make"] });
    }

    return invocations;
  }

  async launch(args: string[]): Promise<number> {
    let request: AnalysisRequest;
    try {
      request = parseRequest(args);
    } catch (error) {
      if (error instanceof UsageError) {
        this.print(error.message);
        return 1;
      }
      throw error;
    }

    if (!(await this.host.pathExists(request.codePath))) {
      this.print(`The path '${request.codePath}' does not exist.`);
      return 1;
    }

    for (const invocation of await this.plan(request)) {
      await this.invoke(invocation, request.codePath);
    }
    return 0;
  }

  private async listCppFiles(codePath: string): Promise<string[]> {
    try {
      const files = await this.host.listFiles(codePath);
      return files.filter((file) => CPP_EXTENSIONS.some((ext) => file.endsWith(ext)));
    } catch (error) {
      this.logger.warn(`Unable to list ${codePath}: ${(error as Error).message}`);
      return [];
    }
  }

  private async invoke(invocation: ToolInvocation, codePath: string): Promise<void> {
    if (!(await this.host.exists(invocation.command))) {
      this.print(`${invocation.tool} not found. Please install it.`);
      return;
    }
    try {
      this.print(`Running ${invocation.tool} on ${codePath}`);
      const exitCode = await this.host.run(invocation.command, invocation.args);
      this.logger.debug(`${invocation.tool} exited with code ${exitCode}`);
    } catch (error) {
      this.print(`Error running ${invocation.tool}: ${(error as Error).message}`);
    }
  }
}
