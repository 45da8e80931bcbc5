import type { Word } from './types';

export type Chip8ErrorKind =
  | 'unknown-opcode'
  | 'address-out-of-range'
  | 'stack-overflow'
  | 'stack-underflow'
  | 'invalid-key'
  | 'unknown-profile'
  | 'invalid-rom';

const hex = (v: number, width = 4): string => `0x${v.toString(16).padStart(width, '0')}`;

export class Chip8Error extends Error {
  constructor(public readonly kind: Chip8ErrorKind, message: string) {
    super(message);
    this.name = 'Chip8Error';
  }
}

export class UnknownOpcodeError extends Chip8Error {
  constructor(public readonly opcode: Word, public readonly address: Word) {
    super('unknown-opcode', `Unknown opcode: ${hex(opcode)} at ${hex(address)}`);
    this.name = 'UnknownOpcodeError';
  }
}

export class AddressOutOfRangeError extends Chip8Error {
  constructor(public readonly address: number, public readonly capacity: number) {
    super('address-out-of-range', `Address ${hex(address)} outside memory of ${capacity} bytes`);
    this.name = 'AddressOutOfRangeError';
  }
}

export class StackOverflowError extends Chip8Error {
  constructor(public readonly address: Word, public readonly capacity: number) {
    super('stack-overflow', `Call stack overflow (depth ${capacity}) at ${hex(address)}`);
    this.name = 'StackOverflowError';
  }
}

export class StackUnderflowError extends Chip8Error {
  constructor(public readonly address: Word) {
    super('stack-underflow', `Return with empty call stack at ${hex(address)}`);
    this.name = 'StackUnderflowError';
  }
}

export class InvalidKeyError extends Chip8Error {
  constructor(public readonly key: number) {
    super('invalid-key', `Invalid key index: ${key} (expected 0..15)`);
    this.name = 'InvalidKeyError';
  }
}

export class UnknownProfileError extends Chip8Error {
  constructor(public readonly value: string) {
    super('unknown-profile', `Unknown quirk profile or toggle: ${value}`);
    this.name = 'UnknownProfileError';
  }
}

export class InvalidRomError extends Chip8Error {
  constructor(message: string) {
    super('invalid-rom', message);
    this.name = 'InvalidRomError';
  }
}

export function isChip8Error(e: unknown): e is Chip8Error {
  return e instanceof Chip8Error;
}
