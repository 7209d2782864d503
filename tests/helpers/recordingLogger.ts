import { StructuredLogger, type LogLevel } from "../../src/logger.js";

/**
 * Logger for tests that need to observe structured entries without writing
 * anything. Subclasses the production logger so it is accepted wherever a
 * {@link StructuredLogger} is expected.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: Array<{ level: LogLevel; message: string; payload?: unknown }> = [];

  constructor() {
    super({ sink: null });
  }

  protected override log(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }
}
