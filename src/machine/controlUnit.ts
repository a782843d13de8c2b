import { ArithmeticUnit } from './alu';
import { FixedNumber } from './number';
import { Register } from './register';
import { DataMemory, InstructionMemory } from './memory';
import { HaltedError, InstructionError } from './errors';
import { isFetchType, isOpcode } from './types';
import type { AluSignal, CycleState, InstructionRecord, Opcode } from './types';

export interface ControlUnitParts {
  acc: Register;
  addrReg: Register;
  dataReg: Register;
  instrPointer: Register;
  instrMem: InstructionMemory;
  dataMem: DataMemory;
  alu: ArithmeticUnit;
}

export interface ControlUnitOptions {
  debug?: boolean;
  log?: (line: string) => void;
}

// Fetch/decode/execute sequencer. Every register-to-register move goes through the
// ALU: open source read gates and target write gates, perform, close them again.
export class ControlUnit {
  // Last fetched instruction and the address it was fetched from.
  instruction: InstructionRecord | null = null;
  address = 0;

  private cycle: CycleState = 'idle';
  private lockInc = false;
  private haltRequested = false;

  private readonly acc: Register;
  private readonly addrReg: Register;
  private readonly dataReg: Register;
  private readonly instrPointer: Register;
  private readonly instrMem: InstructionMemory;
  private readonly dataMem: DataMemory;
  private readonly alu: ArithmeticUnit;
  private readonly debug: boolean;
  private readonly log: (line: string) => void;

  constructor(parts: ControlUnitParts, opts: ControlUnitOptions = {}) {
    this.acc = parts.acc;
    this.addrReg = parts.addrReg;
    this.dataReg = parts.dataReg;
    this.instrPointer = parts.instrPointer;
    this.instrMem = parts.instrMem;
    this.dataMem = parts.dataMem;
    this.alu = parts.alu;
    this.debug = opts.debug ?? false;
    // eslint-disable-next-line no-console
    this.log = opts.log ?? ((line) => console.log(line));
  }

  get state(): CycleState { return this.cycle; }

  get halted(): boolean { return this.cycle === 'halted'; }

  step(): void {
    if (this.cycle === 'halted') throw new HaltedError();
    this.lockInc = false;

    try {
      this.cycle = 'fetch';
      const op = this.fetchInstruction();

      this.cycle = 'execute';
      this.execute(op);

      this.cycle = 'advance';
      if (!this.lockInc) this.transfer([this.instrPointer], [this.instrPointer], ['inc']);
    } catch (e) {
      this.cycle = 'idle';
      throw e;
    }

    this.cycle = this.haltRequested ? 'halted' : 'idle';
  }

  private dbg(line: string): void {
    if (this.debug) this.log(`[CU] ${line}`);
  }

  private fetchInstruction(): Opcode {
    this.instrPointer.openRead();
    this.address = this.instrPointer.read().value;
    try {
      this.instruction = this.instrMem.read();
    } finally {
      this.instrPointer.closeRead();
    }
    const instr = this.instruction;
    if (!instr) throw new InstructionError(null, this.address, 'no instruction at address');
    if (!isOpcode(instr.operation)) throw new InstructionError(instr, this.address, 'invalid operation code');
    this.dbg(`${this.address}: ${instr.operation}${instr.fetch_type ? ` ${instr.fetch_type} ${instr.data ?? 0}` : ''}`);
    return instr.operation;
  }

  private execute(op: Opcode): void {
    switch (op) {
      case 'INC': this.transfer([this.acc], [this.acc], ['inc']); break;
      case 'INV': this.transfer([this.acc], [this.acc], ['inv_left']); break;
      case 'ADD': this.add(false); break;
      case 'SUB': this.add(true); break;
      case 'LD': this.load(); break;
      case 'SV': this.save(); break;
      case 'JMP': this.jump(); break;
      // Conditions look at the stored accumulator, not through its read gate.
      case 'JZ': if (this.acc.value.value === 0) this.jump(); break;
      case 'JP': if (this.acc.value.value > 0) this.jump(); break;
      case 'JN': if (this.acc.value.value < 0) this.jump(); break;
      case 'HLT': this.haltRequested = true; break;
      default: {
        const unreachable: never = op;
        throw new InstructionError(this.instruction, this.address, `invalid operation code ${String(unreachable)}`);
      }
    }
  }

  private transfer(sources: readonly Register[], targets: readonly Register[], signals: readonly AluSignal[] = []): void {
    for (const r of sources) r.openRead();
    for (const r of targets) r.openWrite();
    try {
      this.alu.perform(signals);
    } finally {
      for (const r of sources) r.closeRead();
      for (const r of targets) r.closeWrite();
    }
  }

  // Resolves the instruction operand into the data register.
  private fetchData(): void {
    const instr = this.current();
    const fetchType = instr.fetch_type ?? '';
    if (!isFetchType(fetchType)) throw new InstructionError(instr, this.address, 'invalid fetch_type');
    const value = new FixedNumber(this.acc.bitDepth, instr.data ?? 0);

    switch (fetchType) {
      case 'const':
        this.latch(this.dataReg, value);
        break;
      case 'const_rel':
        this.latch(this.dataReg, this.instrPointer.value.add(value));
        break;
      case 'acc':
        this.transfer([this.acc], [this.dataReg]);
        break;
      case 'abs_mem':
        this.latch(this.addrReg, value);
        this.readMemory();
        break;
      case 'rel_mem':
        // Base is whatever the address register holds when this instruction starts.
        this.latch(this.addrReg, this.addrReg.value.add(value));
        this.readMemory();
        break;
      default: {
        const unreachable: never = fetchType;
        throw new InstructionError(instr, this.address, `invalid fetch_type ${String(unreachable)}`);
      }
    }
  }

  // Immediate values have no register driving a bus, so they are written straight
  // into the target through its write gate.
  private latch(target: Register, value: FixedNumber): void {
    target.openWrite();
    target.write(value);
    target.closeWrite();
  }

  private readMemory(): void {
    this.addrReg.openRead();
    this.dataReg.openWrite();
    try {
      this.dataMem.read();
    } finally {
      this.addrReg.closeRead();
      this.dataReg.closeWrite();
    }
  }

  private add(invert: boolean): void {
    this.fetchData();
    this.transfer([this.dataReg, this.acc], [this.acc], invert ? ['inv_right'] : []);
  }

  private load(): void {
    this.fetchData();
    this.transfer([this.dataReg], [this.addrReg]);
    this.readMemory();
    this.transfer([this.dataReg], [this.acc]);
  }

  private save(): void {
    this.fetchData();
    this.transfer([this.dataReg], [this.addrReg]);
    this.transfer([this.acc], [this.dataReg]);
    this.dataReg.openRead();
    this.addrReg.openRead();
    try {
      this.dataMem.write();
    } finally {
      this.dataReg.closeRead();
      this.addrReg.closeRead();
    }
  }

  private jump(): void {
    this.fetchData();
    this.lockInc = true;
    this.transfer([this.dataReg], [this.instrPointer]);
  }

  private current(): InstructionRecord {
    if (!this.instruction) throw new InstructionError(null, this.address, 'no instruction at address');
    return this.instruction;
  }
}
