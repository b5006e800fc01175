/**
 * Host-exit cleanup for engine subprocesses.
 *
 * Each spawned engine registers a synchronous kill callback at launch and
 * unregisters it when it exits. If the supervising program exits first, the
 * `exit` hook kills whatever is still registered so no engine is orphaned.
 * Node skips `exit` when a termination signal takes its default action, so
 * those signals are hooked as well.
 */

import { createSubsystemLogger } from "../../logging/subsystem.js";

const log = createSubsystemLogger("engine-supervisor/cleanup");

type CleanupEntry = {
  label: string;
  kill: () => void;
};

const entries = new Map<number, CleanupEntry>();
let nextId = 0;
let hookInstalled = false;

const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

export function runCleanup(): number {
  let killed = 0;
  for (const [id, entry] of entries) {
    entries.delete(id);
    try {
      entry.kill();
      killed++;
    } catch (err) {
      log.error(`Cleanup of ${entry.label} failed: ${String(err)}`);
    }
  }
  return killed;
}

/**
 * Listener for termination signals. When another listener owns the signal
 * (the CLI stops the supervisor gracefully) it does nothing; otherwise it
 * kills registered engines and re-raises the signal with the default action.
 */
export function handleTerminationSignal(signal: NodeJS.Signals): void {
  if (process.listenerCount(signal) > 1) {
    return;
  }
  const killed = runCleanup();
  if (killed > 0) {
    log.warn(`Killed ${killed} engine process(es) on ${signal}`);
  }
  process.removeListener(signal, handleTerminationSignal);
  process.kill(process.pid, signal);
}

function installHook(): void {
  if (hookInstalled) {
    return;
  }
  hookInstalled = true;
  process.once("exit", () => {
    const killed = runCleanup();
    if (killed > 0) {
      log.warn(`Killed ${killed} engine process(es) left running at exit`);
    }
  });
  for (const signal of TERMINATION_SIGNALS) {
    process.on(signal, handleTerminationSignal);
  }
}

/**
 * Register a kill callback; returns the function that unregisters it.
 */
export function registerCleanup(label: string, kill: () => void): () => void {
  installHook();
  const id = nextId++;
  entries.set(id, { label, kill });
  return () => {
    entries.delete(id);
  };
}

export function pendingCleanupCount(): number {
  return entries.size;
}
