import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { pendingCleanupCount } from "./cleanup.js";
import { LaunchError } from "./errors.js";
import { buildEngineArgv, createProcessLauncher, logFileName } from "./launcher.js";
import { OTP_PROFILE, createTemplateProfile } from "./profiles.js";
import type { EngineProcess, LaunchRequest } from "./types.js";

const fixture = fileURLToPath(new URL("./__fixtures__/fake-engine.mjs", import.meta.url));

const fixtureProfile = createTemplateProfile({
  buildArgs: [fixture, "build"],
  serveArgs: [fixture, "serve", "{port}"],
});

async function collect(engine: EngineProcess): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of engine.lines) {
    lines.push(line);
  }
  return lines;
}

describe("engine launcher", () => {
  let graphDirectory: string;

  beforeEach(() => {
    graphDirectory = fs.mkdtempSync(path.join(os.tmpdir(), "engine-launcher-"));
  });

  afterEach(() => {
    fs.rmSync(graphDirectory, { recursive: true, force: true });
  });

  function request(phase: "build" | "serve", port?: number): LaunchRequest {
    return {
      phase,
      graphDirectory,
      graphName: "test-graph",
      inputs: { mapExtract: path.join(graphDirectory, "region.osm"), transitFeeds: [] },
      port,
    };
  }

  it("should stream non-empty output lines and report the exit code", async () => {
    const launcher = createProcessLauncher({ command: process.execPath, profile: fixtureProfile });

    const engine = await launcher.launch(request("build"));
    expect(engine.pid).toBeTypeOf("number");
    expect(engine.phase).toBe("build");

    const lines = await collect(engine);
    const exit = await engine.wait();

    expect(lines).toEqual(["Reading map extract", "Graph built"]);
    expect(exit).toEqual({ exitCode: 0, exitSignal: null });
    expect(engine.hasExited()).toBe(true);
    expect(engine.exitCode()).toBe(0);
    engine.dispose();
  });

  it("should interleave stderr into the line stream", async () => {
    const launcher = createProcessLauncher({
      command: process.execPath,
      profile: createTemplateProfile({ buildArgs: [fixture, "crash"], serveArgs: [] }),
    });

    const engine = await launcher.launch(request("build"));
    const lines = await collect(engine);
    const exit = await engine.wait();

    expect(lines).toEqual(['Exception in thread "main" java.lang.IllegalStateException']);
    expect(exit.exitCode).toBe(3);
    engine.dispose();
  });

  it("should stop a serving engine with SIGTERM and unregister its cleanup", async () => {
    const launcher = createProcessLauncher({ command: process.execPath, profile: fixtureProfile });
    const before = pendingCleanupCount();

    const engine = await launcher.launch(request("serve", 43123));
    expect(pendingCleanupCount()).toBe(before + 1);

    const iterator = engine.lines[Symbol.asyncIterator]();
    const first = await iterator.next();
    expect(first.value).toBe("Server started on port 43123");

    engine.kill("SIGTERM");
    const exit = await engine.wait();

    expect(exit.exitCode).toBe(0);
    expect(pendingCleanupCount()).toBe(before);
    engine.dispose();
  });

  it("should write each invocation's output to a log file in the graph directory", async () => {
    const launcher = createProcessLauncher({
      command: process.execPath,
      profile: fixtureProfile,
      logToFile: true,
    });

    const engine = await launcher.launch(request("build"));
    await collect(engine);
    await engine.wait();
    engine.dispose();

    const logs = fs.readdirSync(graphDirectory).filter((name) => name.startsWith("build_"));
    expect(logs).toHaveLength(1);
  });

  it("should reject a missing executable before spawning", async () => {
    const launcher = createProcessLauncher({
      command: path.join(graphDirectory, "missing-engine"),
      profile: fixtureProfile,
    });

    const error = await launcher.launch(request("build")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LaunchError);
    expect(error instanceof LaunchError && error.code).toBe("COMMAND_NOT_FOUND");
  });

  it("should reject a missing engine jar", async () => {
    const launcher = createProcessLauncher({
      command: "java",
      jarPath: path.join(graphDirectory, "otp.jar"),
      profile: OTP_PROFILE,
    });

    await expect(launcher.launch(request("build"))).rejects.toThrow(/Engine jar not found/);
  });

  it("should report a command that is not on the PATH", async () => {
    const launcher = createProcessLauncher({
      command: "engine-binary-that-does-not-exist",
      profile: fixtureProfile,
    });

    const error = await launcher.launch(request("build")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LaunchError);
    expect(error instanceof LaunchError && error.code).toBe("COMMAND_NOT_FOUND");
  });
});

describe("engine argv", () => {
  const base: LaunchRequest = {
    phase: "build",
    graphDirectory: "/data/graphs/berlin",
    graphName: "berlin",
    inputs: { mapExtract: "/data/graphs/berlin/berlin.osm", transitFeeds: [] },
  };

  it("should put the JVM arguments and jar before the profile arguments", () => {
    const argv = buildEngineArgv(
      {
        command: "java",
        jarPath: "/opt/otp.jar",
        jvmArgs: ["-Xmx2G"],
        extraArgs: ["--verbose"],
        profile: OTP_PROFILE,
      },
      base,
    );

    expect(argv).toEqual({
      command: "java",
      args: ["-Xmx2G", "-jar", "/opt/otp.jar", "--build", "/data/graphs/berlin", "--verbose"],
    });
  });

  it("should derive the graph root from the graph directory for serving", () => {
    const argv = buildEngineArgv(
      { command: "java", jarPath: "/opt/otp.jar", profile: OTP_PROFILE },
      { ...base, phase: "serve", port: 8080, extraPorts: [8081] },
    );

    expect(argv.args).toEqual([
      "-jar",
      "/opt/otp.jar",
      "--graphs",
      "/data/graphs",
      "--router",
      "berlin",
      "--server",
      "--port",
      "8080",
      "--securePort",
      "8081",
    ]);
  });

  it("should name log files by phase and timestamp", () => {
    expect(logFileName("serve", new Date("2024-03-01T10:20:30.456Z"))).toBe(
      "serve_2024-03-01T10-20-30-456Z.log",
    );
  });
});
