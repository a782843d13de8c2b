export { FixedNumber } from './machine/number';
export { Register } from './machine/register';
export { ArithmeticUnit } from './machine/alu';
export type { AluRegisters } from './machine/alu';
export { InstructionMemory, DataMemory } from './machine/memory';
export { ControlUnit } from './machine/controlUnit';
export type { ControlUnitOptions, ControlUnitParts } from './machine/controlUnit';
export { Machine, DEFAULT_BIT_DEPTH, MAX_BIT_DEPTH } from './machine/machine';
export type { MachineOptions, MachineSnapshot } from './machine/machine';
export { InstructionError, InvalidAddressError, HaltedError, InitialStateError } from './machine/errors';
export type { AddressSpace } from './machine/errors';
export { InputDevice } from './devices/inputDevice';
export { OutputDevice, toUnit } from './devices/outputDevice';
export type { OutputSink } from './devices/outputDevice';
export { OPCODES, FETCH_TYPES, isOpcode, isFetchType } from './machine/types';
export type {
  Opcode, FetchType, AluSignal, InstructionRecord, InitialState, IGated, IBusRegister, IDevice, CycleState, MachineStatus,
} from './machine/types';
