import type { ConflictFlag, ResolutionRecord } from "./types.js";

/**
 * Append-only log of resolution decisions and conflicts for one file run.
 * Entries are frozen on append; there is no update or delete, and readers get frozen copies of the lists.
 */
export class AuditTrail {
  private readonly resolutionLog: ResolutionRecord[] = [];
  private readonly conflictLog: ConflictFlag[] = [];

  record(entry: ResolutionRecord): Readonly<ResolutionRecord> {
    const frozen = Object.freeze({ ...entry });
    this.resolutionLog.push(frozen);
    return frozen;
  }

  flag(conflict: ConflictFlag): Readonly<ConflictFlag> {
    const frozen = Object.freeze({ ...conflict });
    this.conflictLog.push(frozen);
    return frozen;
  }

  get resolutions(): readonly Readonly<ResolutionRecord>[] {
    return Object.freeze([...this.resolutionLog]);
  }

  get conflicts(): readonly Readonly<ConflictFlag>[] {
    return Object.freeze([...this.conflictLog]);
  }
}
