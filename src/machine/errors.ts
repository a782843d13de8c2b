import type { InstructionRecord } from './types';

export class InstructionError extends Error {
  constructor(public readonly instruction: InstructionRecord | null, public readonly address: number, reason: string) {
    super(`Error in instruction ${JSON.stringify(instruction)} at ${address}: ${reason}`);
    this.name = 'InstructionError';
  }
}

export type AddressSpace = 'data' | 'instruction';

export class InvalidAddressError extends Error {
  constructor(public readonly address: number, public readonly space: AddressSpace, reason = 'invalid address') {
    super(`${reason} (${address}) in ${space} memory`);
    this.name = 'InvalidAddressError';
  }
}

// Halt signal: the normal way a run ends, not a failure.
export class HaltedError extends Error {
  constructor() {
    super('Machine halted');
    this.name = 'HaltedError';
  }
}

export class InitialStateError extends Error {
  constructor(what: string) {
    super(`Invalid initial state: ${what}`);
    this.name = 'InitialStateError';
  }
}
