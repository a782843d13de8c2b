import { FixedNumber } from './number';
import { InitialStateError, InvalidAddressError } from './errors';
import type { IBusRegister, IDevice, InstructionRecord } from './types';

// Program store addressed by the (gated) instruction pointer.
export class InstructionMemory {
  readonly size: number;
  private mem: (InstructionRecord | null)[];

  constructor(private readonly instrPointer: IBusRegister, program: readonly (InstructionRecord | null | undefined)[] = []) {
    this.size = 2 ** instrPointer.bitDepth;
    if (program.length > this.size) {
      throw new InitialStateError(`program has ${program.length} cells, address space holds ${this.size}`);
    }
    this.mem = new Array<InstructionRecord | null>(this.size).fill(null);
    program.forEach((cell, i) => { this.mem[i] = cell ?? null; });
  }

  read(): InstructionRecord | null {
    return this.peek(this.instrPointer.read().value);
  }

  peek(addr: number): InstructionRecord | null {
    if (addr < 0 || addr >= this.size) throw new InvalidAddressError(addr, 'instruction');
    return this.mem[addr];
  }
}

// Data store addressed by the address register, exchanging values with the data register.
// Addresses below DEVICE_WINDOW alias to devices: a read first pulls from the device into
// the cell, a write is forwarded to the device and also kept in the cell.
export class DataMemory {
  static readonly DEVICE_WINDOW = 4;

  readonly size: number;
  private mem: FixedNumber[];

  constructor(
    private readonly addrReg: IBusRegister,
    private readonly dataReg: IBusRegister,
    private readonly devices: readonly IDevice[],
    data: readonly FixedNumber[] = [],
  ) {
    this.size = 2 ** addrReg.bitDepth;
    if (data.length > this.size) {
      throw new InitialStateError(`data has ${data.length} cells, address space holds ${this.size}`);
    }
    this.mem = [];
    for (let i = 0; i < this.size; i++) {
      this.mem.push(i < data.length ? new FixedNumber(dataReg.bitDepth, data[i].value) : new FixedNumber(dataReg.bitDepth));
    }
  }

  read(): void {
    const addr = this.address();
    if (addr < DataMemory.DEVICE_WINDOW) {
      this.mem[addr] = new FixedNumber(this.dataReg.bitDepth, this.device(addr).read().value);
    }
    this.dataReg.write(this.mem[addr]);
  }

  write(): void {
    const addr = this.address();
    const payload = new FixedNumber(this.dataReg.bitDepth, this.dataReg.read().value);
    if (addr < DataMemory.DEVICE_WINDOW) {
      this.device(addr).write(payload);
    }
    this.mem[addr] = payload;
  }

  peek(addr: number): FixedNumber {
    this.check(addr);
    return this.mem[addr].clone();
  }

  poke(addr: number, value: number): void {
    this.check(addr);
    this.mem[addr].set(value);
  }

  private address(): number {
    const addr = this.addrReg.read().value;
    this.check(addr);
    return addr;
  }

  private check(addr: number): void {
    if (addr < 0) throw new InvalidAddressError(addr, 'data', 'Invalid address');
    if (addr >= this.size) throw new InvalidAddressError(addr, 'data', 'Address out of range');
  }

  private device(addr: number): IDevice {
    const dev = this.devices[addr];
    if (!dev) throw new InvalidAddressError(addr, 'data', 'No device mapped');
    return dev;
  }
}
