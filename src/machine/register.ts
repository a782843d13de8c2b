import { FixedNumber } from './number';
import type { IBusRegister } from './types';

// Bus-connected storage cell. While the read gate is closed the register does not
// drive its bus and reads as zero; while the write gate is closed writes are dropped.
export class Register implements IBusRegister {
  private number: FixedNumber;
  private readOpen = false;
  private writeOpen = false;

  constructor(public readonly name: string, bitDepth: number) {
    this.number = new FixedNumber(bitDepth);
  }

  get bitDepth(): number { return this.number.bitDepth; }

  // Raw stored content, independent of gate state.
  get value(): FixedNumber { return this.number.clone(); }

  get isReadOpen(): boolean { return this.readOpen; }
  get isWriteOpen(): boolean { return this.writeOpen; }

  read(): FixedNumber {
    if (this.readOpen) return this.number.clone();
    return new FixedNumber(this.number.bitDepth);
  }

  write(n: FixedNumber): void {
    if (this.writeOpen) this.number.set(n);
  }

  // Loader/test hook: sets the content without going through the gates.
  poke(value: number | FixedNumber): void {
    this.number.set(value);
  }

  openRead(): void { this.readOpen = true; }
  closeRead(): void { this.readOpen = false; }
  openWrite(): void { this.writeOpen = true; }
  closeWrite(): void { this.writeOpen = false; }
}
