import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, envOverrides, loadConfig, mergeConfig } from "./load.js";

describe("config loading", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "engine-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(body: unknown): string {
    const file = path.join(dir, "supervisor.json");
    fs.writeFileSync(file, JSON.stringify(body));
    return file;
  }

  it("should apply defaults to a minimal config", () => {
    const config = loadConfig({ overrides: { graphName: "city" }, env: {} });

    expect(config.graphName).toBe("city");
    expect(config.graphRoot).toBe("graphs");
    expect(config.engine).toEqual({
      kind: "otp",
      command: "java",
      jvmArgs: ["-Xmx2G"],
      extraArgs: [],
      env: {},
    });
    expect(config.maxPortRetries).toBe(3);
    expect(config.serveLiveness).toBe("process");
    expect(config.download).toEqual({ waysOnly: false, minExtractBytes: 10_000, feedConcurrency: 4 });
    expect(config.control).toEqual({
      controlAddress: "tcp://127.0.0.1:18890",
      eventAddress: "tcp://127.0.0.1:18891",
    });
  });

  it("should layer file, environment and explicit overrides", () => {
    const file = writeConfig({
      graphName: "from-file",
      port: 8080,
      engine: { kind: "graphhopper", jar: "/opt/gh.jar" },
      timeouts: { freezeTimeoutMs: 60_000 },
    });

    const config = loadConfig({
      path: file,
      env: { ENGINE_SUPERVISOR_PORT: "9090", ENGINE_SUPERVISOR_CONTROL: "ipc:///tmp/engine.sock" },
      overrides: { graphName: "from-flag", engine: { jvmArgs: ["-Xmx8G"] } },
    });

    expect(config.graphName).toBe("from-flag");
    expect(config.port).toBe(9090);
    expect(config.engine.kind).toBe("graphhopper");
    expect(config.engine.jar).toBe("/opt/gh.jar");
    expect(config.engine.jvmArgs).toEqual(["-Xmx8G"]);
    expect(config.timeouts).toEqual({ freezeTimeoutMs: 60_000 });
    expect(config.control.controlAddress).toBe("ipc:///tmp/engine.sock");
  });

  it("should list every invalid field", () => {
    const file = writeConfig({
      graphName: "",
      port: 70000,
      boundingBox: { left: 10, bottom: 50, right: 9, top: 51 },
    });

    const error = (() => {
      try {
        loadConfig({ path: file, env: {} });
      } catch (err) {
        return err;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.issues).toEqual([
      "graphName: String must contain at least 1 character(s)",
      "boundingBox: left must be less than right and bottom less than top",
      "port: Number must be less than or equal to 65535",
    ]);
  });

  it("should require templates for a generic engine", () => {
    expect(() =>
      loadConfig({ overrides: { graphName: "city", engine: { kind: "generic" } }, env: {} }),
    ).toThrow("engine.buildArgs: a generic engine needs buildArgs and serveArgs");
  });

  it("should reject a file that is not JSON", () => {
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "graphName: city");

    expect(() => loadConfig({ path: file, env: {} })).toThrow(/is not valid JSON/);
  });

  it("should read overrides from the environment", () => {
    expect(
      envOverrides({
        ENGINE_SUPERVISOR_GRAPH_ROOT: "/srv/graphs",
        ENGINE_SUPERVISOR_LOG_LEVEL: " DEBUG ",
        ENGINE_SUPERVISOR_EVENT: "tcp://127.0.0.1:5556",
      }),
    ).toEqual({
      graphRoot: "/srv/graphs",
      logLevel: "debug",
      control: { eventAddress: "tcp://127.0.0.1:5556" },
    });
  });

  it("should merge nested objects and skip undefined values", () => {
    expect(mergeConfig({ a: { b: 1, c: 2 }, d: [1] }, { a: { c: 3 }, d: [2], e: undefined })).toEqual({
      a: { b: 1, c: 3 },
      d: [2],
    });
  });
});
