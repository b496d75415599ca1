import { Logger } from "../config/logger";
import { SessionRecord } from "../shared/types/screening.types";
import { SessionExporter } from "./session-exporter";

/** Runs every exporter even when an earlier one fails, then reports all failures. */
export class CompositeSessionExporter implements SessionExporter {
  constructor(
    private readonly exporters: ReadonlyArray<SessionExporter>,
    private readonly logger: Logger,
  ) {}

  async exportSession(record: Readonly<SessionRecord>): Promise<void> {
    const errors: unknown[] = [];
    for (const exporter of this.exporters) {
      try {
        await exporter.exportSession(record);
      } catch (error) {
        this.logger.warn("session.exporter.failed", {
          sessionId: record.sessionId,
          exporter: exporter.constructor.name,
          error: error instanceof Error ? error.message : "Unknown error",
        });
        errors.push(error);
      }
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, `${errors.length} of ${this.exporters.length} session exporters failed`);
    }
  }
}
