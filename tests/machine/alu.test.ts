import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ArithmeticUnit } from '../../src/machine/alu';
import { Register } from '../../src/machine/register';

function makeRegs(bits = 16) {
  return {
    acc: new Register('acc', bits),
    instrPointer: new Register('ip', bits),
    addrReg: new Register('addr', bits),
    dataReg: new Register('data', bits),
  };
}

describe('ArithmeticUnit', () => {
  it('ORs two drivers on the same bus instead of adding them', () => {
    const regs = makeRegs();
    const alu = new ArithmeticUnit(regs);
    regs.acc.poke(6);
    regs.instrPointer.poke(3);
    regs.acc.openRead();
    regs.instrPointer.openRead();
    regs.dataReg.openWrite();
    alu.perform([]);
    expect(regs.dataReg.value.value).toBe(7);
  });

  it('bus A is acc | ip for any pair of values', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffff }), fc.integer({ min: 0, max: 0xffff }), (a, b) => {
        const regs = makeRegs();
        const alu = new ArithmeticUnit(regs);
        regs.acc.poke(a);
        regs.instrPointer.poke(b);
        regs.acc.openRead();
        regs.instrPointer.openRead();
        regs.dataReg.openWrite();
        alu.perform();
        expect(regs.dataReg.value.value).toBe((a | b) & 0xffff);
      }),
      { numRuns: 200 }
    );
  });

  it('adds bus A and bus B', () => {
    const regs = makeRegs();
    const alu = new ArithmeticUnit(regs);
    regs.acc.poke(7);
    regs.dataReg.poke(5);
    regs.acc.openRead();
    regs.dataReg.openRead();
    regs.acc.openWrite();
    expect(alu.perform().value).toBe(12);
    expect(regs.acc.value.value).toBe(12);
  });

  it('applies inc, inv_left and inv_right', () => {
    const regs = makeRegs();
    const alu = new ArithmeticUnit(regs);
    regs.acc.poke(41);
    regs.acc.openRead();
    regs.acc.openWrite();
    alu.perform(['inc']);
    expect(regs.acc.value.value).toBe(42);
    alu.perform(['inv_left']);
    expect(regs.acc.value.value).toBe(-42);

    regs.acc.poke(7);
    regs.dataReg.poke(3);
    regs.dataReg.openRead();
    alu.perform(['inv_right']);
    expect(regs.acc.value.value).toBe(4);
  });

  it('latches only where the write gate is open', () => {
    const regs = makeRegs();
    const alu = new ArithmeticUnit(regs);
    regs.addrReg.poke(11);
    regs.dataReg.poke(22);
    regs.acc.poke(2);
    regs.acc.openRead();
    regs.instrPointer.openWrite();
    alu.perform(['inc']);
    expect(regs.instrPointer.value.value).toBe(3);
    expect(regs.acc.value.value).toBe(2);
    expect(regs.addrReg.value.value).toBe(11);
    expect(regs.dataReg.value.value).toBe(22);
  });

  it('truncates the sum at its own bit depth', () => {
    const regs = makeRegs();
    const alu = new ArithmeticUnit(regs);
    regs.acc.poke(0xffff);
    regs.acc.openRead();
    regs.acc.openWrite();
    alu.perform(['inc']);
    expect(regs.acc.value.value).toBe(0);

    const narrow = makeRegs();
    const alu4 = new ArithmeticUnit(narrow, 4);
    narrow.acc.poke(15);
    narrow.acc.openRead();
    narrow.dataReg.openWrite();
    alu4.perform(['inc']);
    expect(narrow.dataReg.value.value).toBe(0);
  });

  it('reads zero from undriven buses', () => {
    const regs = makeRegs();
    const alu = new ArithmeticUnit(regs);
    regs.acc.poke(100);
    regs.dataReg.poke(200);
    regs.addrReg.openWrite();
    alu.perform(['inc']);
    expect(regs.addrReg.value.value).toBe(1);
  });
});
