import { FixedNumber } from './number';
import type { AluSignal, IBusRegister } from './types';

export interface AluRegisters {
  acc: IBusRegister;
  instrPointer: IBusRegister;
  addrReg: IBusRegister;
  dataReg: IBusRegister;
}

// Combinational adder between two buses:
//   bus A (left)  = acc | instrPointer
//   bus B (right) = dataReg | addrReg
// The result goes to every register; only those with an open write gate latch it.
export class ArithmeticUnit {
  static readonly BIT_DEPTH = 16;

  constructor(private readonly regs: AluRegisters, public readonly bitDepth = ArithmeticUnit.BIT_DEPTH) {}

  perform(signals: readonly AluSignal[] = []): FixedNumber {
    const { acc, instrPointer, addrReg, dataReg } = this.regs;
    let left = new FixedNumber(this.bitDepth, acc.read().or(instrPointer.read()).value);
    let right = new FixedNumber(this.bitDepth, dataReg.read().or(addrReg.read()).value);

    const res = new FixedNumber(this.bitDepth, signals.includes('inc') ? 1 : 0);
    if (signals.includes('inv_left')) left = left.negate();
    if (signals.includes('inv_right')) right = right.negate();
    res.set(res.add(left).add(right));

    for (const reg of [acc, instrPointer, addrReg, dataReg]) {
      reg.write(res);
    }
    return res;
  }
}
