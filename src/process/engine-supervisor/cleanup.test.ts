import { afterEach, describe, expect, it, vi } from "vitest";
import {
  handleTerminationSignal,
  pendingCleanupCount,
  registerCleanup,
  runCleanup,
} from "./cleanup.js";

describe("engine cleanup", () => {
  afterEach(() => {
    runCleanup();
    vi.restoreAllMocks();
  });

  it("should listen for termination signals once an engine registers", () => {
    const unregister = registerCleanup("serve", () => {});

    expect(process.listeners("SIGINT")).toContain(handleTerminationSignal);
    expect(process.listeners("SIGTERM")).toContain(handleTerminationSignal);
    expect(process.listeners("SIGHUP")).toContain(handleTerminationSignal);

    unregister();
    expect(pendingCleanupCount()).toBe(0);
  });

  it("should kill registered engines and re-raise a signal nobody else handles", () => {
    const kill = vi.fn();
    registerCleanup("serve", kill);
    vi.spyOn(process, "listenerCount").mockReturnValue(1);
    const raise = vi.spyOn(process, "kill").mockImplementation(() => true);

    handleTerminationSignal("SIGHUP");
    const stillListening = process.listeners("SIGHUP").includes(handleTerminationSignal);
    process.on("SIGHUP", handleTerminationSignal);

    expect(kill).toHaveBeenCalledTimes(1);
    expect(pendingCleanupCount()).toBe(0);
    expect(raise).toHaveBeenCalledWith(process.pid, "SIGHUP");
    expect(stillListening).toBe(false);
  });

  it("should leave engines alone when another listener owns the signal", () => {
    const kill = vi.fn();
    registerCleanup("serve", kill);
    vi.spyOn(process, "listenerCount").mockReturnValue(2);
    const raise = vi.spyOn(process, "kill").mockImplementation(() => true);

    handleTerminationSignal("SIGTERM");

    expect(kill).not.toHaveBeenCalled();
    expect(raise).not.toHaveBeenCalled();
    expect(pendingCleanupCount()).toBe(1);
  });
});
