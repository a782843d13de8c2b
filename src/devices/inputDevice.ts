import { FixedNumber } from '../machine/number';
import type { IDevice } from '../machine/types';

// Memory-mapped input: each read at its window address pulls the next pending unit,
// and 0 once the queue is drained.
export class InputDevice implements IDevice {
  readonly name = 'input';
  private buffer: number[] = [];
  private pointer = 0;

  constructor(source: string | readonly number[] = [], public readonly bitDepth = 16) {
    this.feed(source);
  }

  get remaining(): number { return this.buffer.length - this.pointer; }

  feed(source: string | readonly number[]): void {
    if (typeof source === 'string') {
      for (const ch of source) this.buffer.push(ch.codePointAt(0) ?? 0);
    } else {
      this.buffer.push(...source);
    }
  }

  read(): FixedNumber {
    if (this.pointer >= this.buffer.length) return new FixedNumber(this.bitDepth);
    return new FixedNumber(this.bitDepth, this.buffer[this.pointer++]);
  }

  write(): void { }

  reset(): void {
    this.buffer = [];
    this.pointer = 0;
  }
}
