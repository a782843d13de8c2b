// Fixed-width signed value. Truncation is signed-magnitude: only the magnitude is
// masked to bitDepth bits and the sign of the assigned value is put back, so
// -0x1_0005 at 16 bits is -5 rather than a two's-complement wrap.

const MAX_BIT_DEPTH = 52;

export class FixedNumber {
  readonly bitDepth: number;
  private v = 0;

  constructor(bitDepth: number, value = 0) {
    if (!Number.isInteger(bitDepth) || bitDepth < 1 || bitDepth > MAX_BIT_DEPTH) {
      throw new RangeError(`bit depth must be an integer in 1..${MAX_BIT_DEPTH}, got ${bitDepth}`);
    }
    this.bitDepth = bitDepth;
    if (value !== 0) this.set(value);
  }

  get value(): number { return this.v; }

  get mask(): number { return 2 ** this.bitDepth - 1; }

  get magnitude(): number { return Math.abs(this.v); }

  set(value: number | FixedNumber): void {
    const raw = typeof value === 'number' ? value : value.value;
    if (!Number.isInteger(raw)) throw new RangeError(`value must be an integer, got ${raw}`);
    // low bitDepth bits of the magnitude
    const mag = Math.abs(raw) % (this.mask + 1);
    this.v = raw < 0 && mag !== 0 ? -mag : mag;
  }

  // Result bit depth is the narrower of the two operands.
  add(n: FixedNumber): FixedNumber {
    return new FixedNumber(Math.min(this.bitDepth, n.bitDepth), this.v + n.value);
  }

  sub(n: FixedNumber): FixedNumber {
    return new FixedNumber(Math.min(this.bitDepth, n.bitDepth), this.v - n.value);
  }

  negate(): FixedNumber {
    return new FixedNumber(this.bitDepth, -this.v);
  }

  // Bus contention: two drivers on one line combine bitwise, not arithmetically.
  or(n: FixedNumber): FixedNumber {
    const bits = BigInt(this.v) | BigInt(n.value);
    return new FixedNumber(Math.min(this.bitDepth, n.bitDepth), Number(bits));
  }

  isZero(): boolean { return this.v === 0; }

  clone(): FixedNumber { return new FixedNumber(this.bitDepth, this.v); }

  toString(): string { return String(this.v); }
}
