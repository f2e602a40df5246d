import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { consoleLogger, type Logger } from "./logger.js";

export interface TraceSink {
  /** Returns where the trace was written, or null when it could not be. */
  record(trace: Record<string, unknown>): Promise<string | null>;
}

const compactTimestamp = (date: Date): string => date.toISOString().replace(/[-:]/g, "").replace(/\..+$/, "").replace("T", "_");

/** Writes each execution trace as its own JSON file; write failures are logged, never thrown. */
export class TraceRecorder implements TraceSink {
  private seq = 0;

  constructor(
    private readonly dir: string,
    private readonly logger: Logger = consoleLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async record(trace: Record<string, unknown>): Promise<string | null> {
    const at = this.now();
    this.seq += 1;
    const path = join(this.dir, `execution_trace_${compactTimestamp(at)}_${this.seq}.json`);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(path, JSON.stringify({ timestamp: at.toISOString(), ...trace }, null, 2), "utf8");
      return path;
    } catch (error) {
      this.logger.warn(`[trace] could not write ${path}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}
