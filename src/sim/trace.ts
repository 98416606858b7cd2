import type { StructuredLogger } from "../logger.js";

/**
 * Append-only sink receiving the human readable trace of a run. Lines land in
 * the caller's array in emission order; when a logger is attached each line
 * is mirrored as a `sim_trace` debug entry.
 */
export class TraceLog {
  private step = 0;

  constructor(
    private readonly lines: string[],
    private readonly logger?: StructuredLogger,
  ) {}

  append(line: string): void {
    this.lines.push(line);
    this.step += 1;
    this.logger?.debug("sim_trace", { step: this.step, line });
  }

  /** Blank separator line framing the verdict block. */
  blank(): void {
    this.append("");
  }

  get length(): number {
    return this.lines.length;
  }
}
