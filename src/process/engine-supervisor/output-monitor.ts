/**
 * Output Monitor
 *
 * Reads one engine process's output concurrently with the supervisor,
 * timestamps activity, and turns classified lines into events on the
 * supervisor's queue. The exit event is queued only after the output stream
 * has ended, so it always follows the lines that preceded it.
 */

import { createSubsystemLogger, type SubsystemLogger } from "../../logging/subsystem.js";
import type { OutputTail } from "./output-tail.js";
import { classifyLine, type MarkerRule } from "./profiles.js";
import type { ActivityState, EngineProcess, MonitorEvent } from "./types.js";

export type MonitorEventSink = {
  push(event: MonitorEvent): void;
};

export type OutputMonitorOptions = {
  process: EngineProcess;
  rules: readonly MarkerRule[];
  events: MonitorEventSink;
  tail: OutputTail;
  onLine?: (line: string, ts: number) => void;
  now?: () => number;
};

export class OutputMonitor {
  private readonly state: ActivityState;
  private readonly engineLog: SubsystemLogger;
  private readonly now: () => number;

  constructor(private readonly options: OutputMonitorOptions) {
    this.now = options.now ?? Date.now;
    const startedAtMs = this.now();
    this.state = { startedAtMs, lastOutputAtMs: startedAtMs, linesSeen: 0 };
    this.engineLog = createSubsystemLogger(`engine/${options.process.phase}`);
  }

  get activity(): Readonly<ActivityState> {
    return this.state;
  }

  idleMs(now: number = this.now()): number {
    return Math.max(0, now - this.state.lastOutputAtMs);
  }

  private record(line: string): number {
    const ts = this.now();
    // Clock adjustments must not move activity backwards.
    this.state.lastOutputAtMs = Math.max(this.state.lastOutputAtMs, ts);
    this.state.lastLine = line;
    this.state.linesSeen++;
    return ts;
  }

  async run(): Promise<void> {
    const { process: engine, rules, events, tail, onLine } = this.options;

    for await (const line of engine.lines) {
      const ts = this.record(line);
      tail.push(line);
      this.engineLog.debug(line);
      onLine?.(line, ts);

      const event = classifyLine(rules, engine.phase, line, ts);
      if (event) {
        events.push(event);
      }
    }

    const exit = await engine.wait();
    events.push({
      kind: "exited",
      ts: this.now(),
      exitCode: exit.exitCode,
      exitSignal: exit.exitSignal,
    });
  }
}
