import { SessionRecord } from "../shared/types/screening.types";

export interface SessionExporter {
  exportSession(record: Readonly<SessionRecord>): Promise<void>;
}
