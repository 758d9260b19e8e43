import { StringDecoder } from 'string_decoder';

/**
 * Splits a byte stream into complete lines. Text after the last newline is
 * held until more data arrives; `discard()` drops it when the producing
 * process is gone, so a torn line never reaches the parser. A UTF-8
 * character split across chunks is held the same way.
 */
export class LineBuffer {
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';

  push(chunk: Buffer | string): string[] {
    const text = this.pending + (typeof chunk === 'string' ? chunk : this.decoder.write(chunk));
    const parts = text.split(/\r?\n/);
    this.pending = parts.pop() ?? '';
    return parts.filter((ln) => ln.trim() !== '');
  }

  /** Returns and clears the incomplete tail, if any. */
  discard(): string {
    const tail = this.pending + this.decoder.end();
    this.pending = '';
    return tail;
  }
}
