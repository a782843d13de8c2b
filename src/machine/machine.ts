import { ArithmeticUnit } from './alu';
import { ControlUnit } from './controlUnit';
import { DataMemory, InstructionMemory } from './memory';
import { FixedNumber } from './number';
import { Register } from './register';
import { HaltedError, InitialStateError } from './errors';
import { InputDevice } from '../devices/inputDevice';
import { OutputDevice } from '../devices/outputDevice';
import type { IDevice, InitialState, InstructionRecord, MachineStatus } from './types';

export const DEFAULT_BIT_DEPTH = 16;
// Memories are allocated eagerly at 2^bitDepth cells each.
export const MAX_BIT_DEPTH = 20;

export interface MachineOptions {
  bitDepth?: number;
  devices?: readonly IDevice[];
  trace?: boolean; // log register state after every instruction
  debug?: boolean; // control unit decode log
  log?: (line: string) => void;
  env?: Record<string, string | undefined>;
}

export interface MachineSnapshot {
  ip: number;
  acc: number;
  addr: number;
  data: number;
  halted: boolean;
}

function envFlag(raw: string | undefined): boolean {
  return raw === '1' || raw === 'true';
}

function envBitDepth(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 1 && n <= MAX_BIT_DEPTH ? n : undefined;
}

function parseProgramCell(cell: unknown, i: number): InstructionRecord | null {
  if (cell === null || cell === undefined) return null;
  if (typeof cell !== 'object' || !('operation' in cell) || typeof cell.operation !== 'string') {
    throw new InitialStateError(`program cell ${i} should be an instruction record`);
  }
  const record: InstructionRecord = { operation: cell.operation };
  if ('fetch_type' in cell && typeof cell.fetch_type === 'string') record.fetch_type = cell.fetch_type;
  if ('data' in cell && cell.data !== undefined && cell.data !== null) {
    if (typeof cell.data !== 'number' || !Number.isInteger(cell.data)) {
      throw new InitialStateError(`program cell ${i}: data ${String(cell.data)} should be an integer`);
    }
    record.data = cell.data;
  }
  return record;
}

export class Machine {
  readonly bitDepth: number;
  readonly acc: Register;
  readonly addrReg: Register;
  readonly dataReg: Register;
  readonly instrPointer: Register;
  readonly instrMem: InstructionMemory;
  readonly dataMem: DataMemory;
  readonly alu: ArithmeticUnit;
  readonly devices: readonly IDevice[];
  readonly controlUnit: ControlUnit;

  private readonly trace: boolean;
  private readonly log: (line: string) => void;

  constructor(initial: InitialState = {}, opts: MachineOptions = {}) {
    const env = opts.env ?? process.env;
    this.bitDepth = opts.bitDepth ?? envBitDepth(env.MACHINE_BIT_DEPTH) ?? DEFAULT_BIT_DEPTH;
    if (!Number.isInteger(this.bitDepth) || this.bitDepth < 1 || this.bitDepth > MAX_BIT_DEPTH) {
      throw new RangeError(`bit depth must be an integer in 1..${MAX_BIT_DEPTH}, got ${this.bitDepth}`);
    }
    this.trace = opts.trace ?? envFlag(env.MACHINE_TRACE);
    // eslint-disable-next-line no-console
    this.log = opts.log ?? ((line) => console.log(line));

    const { data, program } = this.parseInitial(initial);

    this.acc = new Register('acc', this.bitDepth);
    this.addrReg = new Register('addr', this.bitDepth);
    this.dataReg = new Register('data', this.bitDepth);
    this.instrPointer = new Register('ip', this.bitDepth);
    this.devices = opts.devices ?? [new InputDevice(), new OutputDevice()];
    this.instrMem = new InstructionMemory(this.instrPointer, program);
    this.dataMem = new DataMemory(this.addrReg, this.dataReg, this.devices, data);
    this.alu = new ArithmeticUnit({
      acc: this.acc,
      instrPointer: this.instrPointer,
      addrReg: this.addrReg,
      dataReg: this.dataReg,
    });
    this.controlUnit = new ControlUnit({
      acc: this.acc,
      addrReg: this.addrReg,
      dataReg: this.dataReg,
      instrPointer: this.instrPointer,
      instrMem: this.instrMem,
      dataMem: this.dataMem,
      alu: this.alu,
    }, { debug: opts.debug ?? envFlag(env.MACHINE_DEBUG), log: this.log });
  }

  static fromInitial(initial: InitialState, opts: MachineOptions = {}): Machine {
    return new Machine(initial, opts);
  }

  get halted(): boolean { return this.controlUnit.halted; }

  // One instruction. Stepping a halted machine reports completion instead of failing;
  // instruction and address errors propagate.
  singleStep(): MachineStatus {
    try {
      this.controlUnit.step();
    } catch (e) {
      if (!(e instanceof HaltedError)) throw e;
      this.log('[MACHINE] halted');
      return 'halted';
    }
    if (this.trace) this.log(this.traceLine());
    if (this.controlUnit.halted) {
      this.log('[MACHINE] halted');
      return 'halted';
    }
    return 'running';
  }

  // Steps until halted and returns how many instructions were executed. maxSteps
  // bounds runaway programs.
  run(maxSteps?: number): number {
    let steps = 0;
    while (!this.controlUnit.halted) {
      if (maxSteps !== undefined && steps >= maxSteps) {
        throw new RangeError(`machine did not halt within ${maxSteps} steps`);
      }
      this.singleStep();
      steps++;
    }
    return steps;
  }

  snapshot(): MachineSnapshot {
    return {
      ip: this.instrPointer.value.value,
      acc: this.acc.value.value,
      addr: this.addrReg.value.value,
      data: this.dataReg.value.value,
      halted: this.controlUnit.halted,
    };
  }

  private traceLine(): string {
    const s = this.snapshot();
    const op = this.controlUnit.instruction?.operation ?? '-';
    return `[TRACE] ip=${this.controlUnit.address} op=${op} acc=${s.acc} ar=${s.addr} dr=${s.data}`;
  }

  private parseInitial(initial: InitialState): { data: FixedNumber[]; program: (InstructionRecord | null)[] } {
    const data = (initial.data ?? []).map((token, i) => {
      if (typeof token !== 'number' || !Number.isInteger(token)) {
        throw new InitialStateError(`data cell ${i} (${String(token)}) should be an integer`);
      }
      return new FixedNumber(this.bitDepth, token);
    });
    const program = (initial.program ?? []).map((cell, i) => parseProgramCell(cell, i));
    return { data, program };
  }
}
