/**
 * Issues 64-bit time-ordered ids rendered as 16 upper-case hex digits:
 * 44 bits of milliseconds, 8 bits of worker id, 12 bits of sequence.
 */
export class IdIssueService {
  private static readonly WORKER_BITS = BigInt(8);
  private static readonly SEQ_BITS = BigInt(12);
  private static readonly TS_SHIFT = IdIssueService.WORKER_BITS + IdIssueService.SEQ_BITS;
  private static readonly SEQ_MAX = (BigInt(1) << IdIssueService.SEQ_BITS) - BigInt(1);

  private readonly workerId: bigint;
  private lastMs = BigInt(-1);
  private seq = BigInt(0);

  constructor(workerId: number) {
    if (!Number.isInteger(workerId) || workerId < 0 || workerId > 0xff) {
      throw new Error("workerId must be an integer in [0, 255]");
    }
    this.workerId = BigInt(workerId);
  }

  issueId(now: number = Date.now()): string {
    let ms = BigInt(Math.floor(now));
    if (ms < this.lastMs) ms = this.lastMs;
    if (ms === this.lastMs) {
      if (this.seq === IdIssueService.SEQ_MAX) {
        ms = this.lastMs + BigInt(1);
        this.seq = BigInt(0);
      } else {
        this.seq += BigInt(1);
      }
    } else {
      this.seq = BigInt(0);
    }
    this.lastMs = ms;
    const id =
      (ms << IdIssueService.TS_SHIFT) |
      (this.workerId << IdIssueService.SEQ_BITS) |
      this.seq;
    return IdIssueService.toHex(id);
  }

  static lowerBoundIdForDate(date: Date): string {
    return IdIssueService.toHex(BigInt(date.getTime()) << IdIssueService.TS_SHIFT);
  }

  static timestampOfId(id: string): Date {
    if (!/^[0-9A-Fa-f]{16}$/.test(id)) throw new Error(`malformed id: ${id}`);
    return new Date(Number(BigInt(`0x${id}`) >> IdIssueService.TS_SHIFT));
  }

  private static toHex(id: bigint): string {
    return id.toString(16).padStart(16, "0").toUpperCase();
  }
}
