import { isHeaderLine, isJsonLine } from './parser.js';

/**
 * Groups raw lines into packets. JSON lines are packets on their own; a text
 * header starts a packet that collects continuation lines until the next
 * header, `idleMs` of silence, or `flush()`.
 */
export class PacketAssembler {
  private pending: string[] | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly onPacket: (lines: string[]) => void,
    private readonly idleMs = 3_000
  ) {}

  push(line: string): void {
    if (isJsonLine(line)) {
      this.flush();
      this.onPacket([line]);
      return;
    }
    if (isHeaderLine(line)) {
      this.flush();
      this.pending = [line];
      this.arm();
      return;
    }
    if (this.pending) {
      this.pending.push(line);
      this.arm();
      return;
    }
    // continuation without a header; the parser will report it as unknown
    this.onPacket([line]);
  }

  flush(): void {
    this.disarm();
    const lines = this.pending;
    this.pending = null;
    if (lines) this.onPacket(lines);
  }

  private arm(): void {
    this.disarm();
    if (this.idleMs <= 0) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.idleMs);
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
