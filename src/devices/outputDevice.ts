import { FixedNumber } from '../machine/number';
import type { IDevice } from '../machine/types';

export type OutputSink = (unit: string) => void;

const REPLACEMENT = '\ufffd';

export function toUnit(value: number): string {
  if (value < 0 || value > 0x10ffff) return REPLACEMENT;
  return String.fromCodePoint(value);
}

// Memory-mapped output: every write is one unit, held until flush() hands the
// pending units to the sink in order.
export class OutputDevice implements IDevice {
  readonly name = 'output';
  private pending: number[] = [];
  private log: string[] = [];

  constructor(private readonly sink?: OutputSink, public readonly bitDepth = 16) {}

  get pendingCount(): number { return this.pending.length; }

  read(): FixedNumber {
    return new FixedNumber(this.bitDepth);
  }

  write(n: FixedNumber): void {
    this.pending.push(n.value);
  }

  flush(): string {
    const units = this.pending.map(toUnit);
    this.pending = [];
    for (const unit of units) {
      this.log.push(unit);
      this.sink?.(unit);
    }
    return units.join('');
  }

  getLog(): string {
    return this.log.join('');
  }

  reset(): void {
    this.pending = [];
    this.log = [];
  }
}
