import type { FixedNumber } from './number';

export const OPCODES = ['INC', 'INV', 'ADD', 'SUB', 'LD', 'SV', 'JMP', 'JZ', 'JP', 'JN', 'HLT'] as const;
export type Opcode = typeof OPCODES[number];

export const FETCH_TYPES = ['const', 'const_rel', 'acc', 'abs_mem', 'rel_mem'] as const;
export type FetchType = typeof FETCH_TYPES[number];

export type AluSignal = 'inc' | 'inv_left' | 'inv_right';

// Wire shape of one program cell as produced by the assembler. Fields stay loose
// strings here; the control unit narrows them at decode time.
export interface InstructionRecord {
  operation: string;
  fetch_type?: string;
  data?: number;
}

export interface InitialState {
  data?: readonly number[];
  program?: readonly (InstructionRecord | null | undefined)[];
}

export interface IGated {
  openRead(): void;
  closeRead(): void;
  openWrite(): void;
  closeWrite(): void;
}

export interface IBusRegister extends IGated {
  readonly name: string;
  readonly bitDepth: number;
  read(): FixedNumber;
  write(n: FixedNumber): void;
}

export interface IDevice {
  readonly name: string;
  read(): FixedNumber;
  write(n: FixedNumber): void;
  reset(): void;
}

export type CycleState = 'idle' | 'fetch' | 'execute' | 'advance' | 'halted';
export type MachineStatus = 'running' | 'halted';

export function isOpcode(s: string): s is Opcode {
  return (OPCODES as readonly string[]).includes(s);
}

export function isFetchType(s: string): s is FetchType {
  return (FETCH_TYPES as readonly string[]).includes(s);
}
