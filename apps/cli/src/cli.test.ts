import { afterEach, describe, expect, it, vi } from "vitest";
import {
  BadRequestError,
  createInMemoryBundleSource,
} from "@nlsbridge/application";
import { createSilentLogger } from "@nlsbridge/shared";
import { createCliCompositionRoot } from "./bootstrap/composition-root.js";
import { parseCliArgs, runCli, USAGE, type CliIo } from "./cli.js";

const bundleSource = createInMemoryBundleSource({
  "com.example.messages": {
    "": { greeting: "Hello", farewell: "Goodbye" },
    _de: { greeting: "Hallo" },
  },
});

function captureIo(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

function run(argv: string[], env: NodeJS.ProcessEnv = {}) {
  const io = captureIo();
  const exitCode = runCli(argv, {
    io,
    createRoot: () =>
      createCliCompositionRoot({
        env,
        bundleSource,
        logger: createSilentLogger(),
      }),
  });
  return { io, exitCode };
}

describe("parseCliArgs", () => {
  it("parses bundle, locale, flags and keys", () => {
    expect(
      parseCliArgs(["-b", "com.example.messages", "--locale", "de-AT", "--json", "greeting"]),
    ).toEqual({
      kind: "resolve",
      bundleName: "com.example.messages",
      keys: ["greeting"],
      json: true,
      locale: { language: "de", country: "AT", variant: "" },
    });
  });

  it("recognizes help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
  });

  it("requires a bundle and at least one key", () => {
    expect(() => parseCliArgs(["greeting"])).toThrow("--bundle is required");
    expect(() => parseCliArgs(["--bundle", "com.example.messages"])).toThrow(
      "At least one message key is required",
    );
  });

  it("rejects unknown options as bad requests", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow(BadRequestError);
  });
});

describe("runCli", () => {
  it("prints one message per key", async () => {
    const { io, exitCode } = run([
      "--bundle",
      "com.example.messages",
      "greeting",
      "missing",
      "farewell",
    ]);

    await expect(exitCode).resolves.toBe(0);
    expect(io.out).toEqual(["Hello", "!missing!", "Goodbye"]);
    expect(io.err).toEqual([]);
  });

  it("uses the locale from the environment unless overridden", async () => {
    const fromEnv = run(["-b", "com.example.messages", "greeting"], {
      LANG: "de_DE.UTF-8",
    });
    await expect(fromEnv.exitCode).resolves.toBe(0);
    expect(fromEnv.io.out).toEqual(["Hallo"]);

    const overridden = run(
      ["-b", "com.example.messages", "-l", "en", "greeting"],
      { LANG: "de_DE.UTF-8" },
    );
    await expect(overridden.exitCode).resolves.toBe(0);
    expect(overridden.io.out).toEqual(["Hello"]);
  });

  it("echoes keys when the switch is set in the environment or by flag", async () => {
    const fromEnv = run(["-b", "com.example.messages", "greeting"], {
      showMessageKeys: "true",
    });
    await expect(fromEnv.exitCode).resolves.toBe(0);
    expect(fromEnv.io.out).toEqual(["greeting"]);

    const fromFlag = run(["-b", "com.example.messages", "--show-keys", "greeting"]);
    await expect(fromFlag.exitCode).resolves.toBe(0);
    expect(fromFlag.io.out).toEqual(["greeting"]);
  });

  it("prints a JSON object with --json", async () => {
    const { io, exitCode } = run([
      "-b",
      "com.example.messages",
      "--json",
      "greeting",
      "missing",
    ]);

    await expect(exitCode).resolves.toBe(0);
    expect(JSON.parse(io.out[0] ?? "")).toEqual({
      greeting: "Hello",
      missing: "!missing!",
    });
  });

  it("reports a missing bundle as an error body and exit code 1", async () => {
    const { io, exitCode } = run(["-b", "does.not.exist", "greeting"]);

    await expect(exitCode).resolves.toBe(1);
    expect(io.out).toEqual([]);
    expect(JSON.parse(io.err[0] ?? "")).toEqual({
      message: "Can't find bundle for base name does.not.exist, locale root",
      code: "RESOURCE_NOT_FOUND",
      details: { bundleName: "does.not.exist", locale: "root" },
    });
  });

  it("reports configuration errors", async () => {
    const { io, exitCode } = run(["-b", "com.example.messages", "greeting"], {
      NLS_BUNDLE_SOURCE: "redis",
    });

    await expect(exitCode).resolves.toBe(1);
    expect(JSON.parse(io.err[0] ?? "")).toMatchObject({
      code: "CONFIGURATION_ERROR",
    });
  });

  it("prints usage for --help", async () => {
    const { io, exitCode } = run(["--help"]);

    await expect(exitCode).resolves.toBe(0);
    expect(io.out).toEqual([USAGE]);
  });
});

describe("runCli with the default logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function runWithDefaultLogger(argv: string[]) {
    const io = captureIo();
    const exitCode = runCli(argv, {
      io,
      createRoot: () =>
        createCliCompositionRoot({
          env: { NLS_LOG_LEVEL: "debug" },
          bundleSource,
        }),
    });
    return { io, exitCode };
  }

  it("keeps log lines off stdout", async () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const { io, exitCode } = runWithDefaultLogger([
      "-b",
      "com.example.messages",
      "greeting",
      "missing",
    ]);

    await expect(exitCode).resolves.toBe(0);
    expect(io.out).toEqual(["Hello", "!missing!"]);
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalled();
  });

  it("prints parseable JSON with --json", async () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const { io, exitCode } = runWithDefaultLogger([
      "-b",
      "com.example.messages",
      "--json",
      "greeting",
    ]);

    await expect(exitCode).resolves.toBe(0);
    expect(io.out).toHaveLength(1);
    expect(JSON.parse(io.out[0] ?? "")).toEqual({ greeting: "Hello" });
    expect(stdout).not.toHaveBeenCalled();
  });
});
