import { describe, expect, it, vi } from "vitest";

import { AnalysisLauncher, USAGE, UsageError, parseRequest, type ToolHost } from "../src/launcher.js";

function createHost(overrides: Partial<ToolHost> = {}): ToolHost {
  return {
    exists: vi.fn().mockResolvedValue(true),
    run: vi.fn().mockResolvedValue(0),
    listFiles: vi.fn().mockResolvedValue([]),
    pathExists: vi.fn().mockResolvedValue(true),
    ...overrides,
  };
}

describe("parseRequest", () => {
  it("defaults to every language in basic mode", () => {
    expect(parseRequest(["src"])).toEqual({ codePath: "src", language: "all", mode: "basic" });
  });

  it("rejects a wrong argument count", () => {
    expect(() => parseRequest([])).toThrow(UsageError);
    expect(() => parseRequest(["a", "b", "c", "d"])).toThrow(USAGE);
  });

  it("rejects unknown languages and modes", () => {
    expect(() => parseRequest(["src", "rust"])).toThrow("Invalid language specified. Use 'swift', 'cpp', or 'all'.");
    expect(() => parseRequest(["src", "swift", "deep"])).toThrow("Invalid mode specified. Use 'basic' or 'advanced'.");
  });
});

describe("AnalysisLauncher", () => {
  it("runs the basic linters for every language", async () => {
    const host = createHost();
    const lines: string[] = [];

    const code = await new AnalysisLauncher(host, (line) => lines.push(line)).launch(["src"]);

    expect(code).toBe(0);
    expect(host.run).toHaveBeenNthCalledWith(1, "swiftlint", ["lint", "src"]);
    expect(host.run).toHaveBeenNthCalledWith(2, "cppcheck", ["src"]);
    expect(lines).toEqual(["Running SwiftLint on src", "Running Cppcheck on src"]);
  });

  it("adds clang-tidy and infer in advanced mode", async () => {
    const host = createHost({ listFiles: vi.fn().mockResolvedValue(["a.cpp", "b.cc", "notes.md", "c.cxx"]) });

    const code = await new AnalysisLauncher(host, () => undefined).launch(["native", "cpp", "advanced"]);

    expect(code).toBe(0);
    expect(host.run).toHaveBeenNthCalledWith(1, "cppcheck", ["native"]);
    expect(host.run).toHaveBeenNthCalledWith(2, "clang-tidy", ["--quiet", "a.cpp", "b.cc", "c.cxx", "--", "-Inative"]);
    expect(host.run).toHaveBeenNthCalledWith(3, "infer", ["run", "--", "make"]);
  });

  it("notes when there are no C++ sources for clang-tidy", async () => {
    const host = createHost();
    const lines: string[] = [];

    await new AnalysisLauncher(host, (line) => lines.push(line)).launch(["app", "swift", "advanced"]);

    expect(lines).toEqual(["Running SwiftLint on app", "Running Infer on app"]);

    lines.length = 0;
    await new AnalysisLauncher(createHost(), (line) => lines.push(line)).launch(["app", "cpp", "advanced"]);
    expect(lines).toContain("No C++ files found for Clang-Tidy.");
  });

  it("continues when a tool is not installed", async () => {
    const host = createHost({ exists: vi.fn(async (command: string) => command !== "swiftlint") });
    const lines: string[] = [];

    const code = await new AnalysisLauncher(host, (line) => lines.push(line)).launch(["src", "all"]);

    expect(code).toBe(0);
    expect(lines).toEqual(["SwiftLint not found. Please install it.", "Running Cppcheck on src"]);
    expect(host.run).toHaveBeenCalledTimes(1);
  });

  it("keeps going when a tool fails to start", async () => {
    const host = createHost({ run: vi.fn().mockRejectedValueOnce(new Error("EACCES")).mockResolvedValue(0) });
    const lines: string[] = [];

    const code = await new AnalysisLauncher(host, (line) => lines.push(line)).launch(["src"]);

    expect(code).toBe(0);
    expect(lines).toEqual([
      "Running SwiftLint on src",
      "Error running SwiftLint: EACCES",
      "Running Cppcheck on src",
    ]);
  });

  it("exits with 1 on invalid arguments or a missing path", async () => {
    const lines: string[] = [];
    const print = (line: string) => lines.push(line);

    await expect(new AnalysisLauncher(createHost(), print).launch([])).resolves.toBe(1);
    await expect(new AnalysisLauncher(createHost(), print).launch(["src", "rust"])).resolves.toBe(1);
    await expect(
      new AnalysisLauncher(createHost({ pathExists: vi.fn().mockResolvedValue(false) }), print).launch(["missing"]),
    ).resolves.toBe(1);

    expect(lines).toEqual([
      USAGE,
      "Invalid language specified. Use 'swift', 'cpp', or 'all'.",
      "The path 'missing' does not exist.",
    ]);
  });
});
