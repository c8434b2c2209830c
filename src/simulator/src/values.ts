/**
 * Tagged machine values
 *
 * A register cell or memory word carries either a 64-bit integer or a
 * double. Every read site picks a view explicitly:
 * - the integer view of a float is its IEEE-754 bit pattern
 * - the float view of an integer is the double with that bit pattern
 */

export interface IntValue {
  kind: 'int';
  value: bigint; // unsigned 64-bit unless stored raw in memory
}

export interface FloatValue {
  kind: 'float';
  value: number;
}

export type Value = IntValue | FloatValue;

export const WORD_SIZE = 8n;
export const MASK_64 = 0xFFFF_FFFF_FFFF_FFFFn;
export const MASK_32 = 0xFFFF_FFFFn;

export const ZERO: IntValue = { kind: 'int', value: 0n };

export function intValue(value: bigint): IntValue {
  return { kind: 'int', value };
}

export function floatValue(value: number): FloatValue {
  return { kind: 'float', value };
}

const scratch = new DataView(new ArrayBuffer(8));

/**
 * Bit pattern of a double as an unsigned 64-bit integer
 */
export function floatToBits(value: number): bigint {
  scratch.setFloat64(0, value);
  return scratch.getBigUint64(0);
}

/**
 * Double whose bit pattern is the low 64 bits of the integer
 */
export function bitsToFloat(bits: bigint): number {
  scratch.setBigUint64(0, BigInt.asUintN(64, bits));
  return scratch.getFloat64(0);
}

/**
 * Integer view (unsigned 64-bit)
 */
export function asUnsigned(value: Value): bigint {
  if (value.kind === 'float') {
    return floatToBits(value.value);
  }
  return BigInt.asUintN(64, value.value);
}

/**
 * Integer view (signed 64-bit)
 */
export function asSigned(value: Value): bigint {
  return BigInt.asIntN(64, asUnsigned(value));
}

/**
 * Float view
 */
export function asFloat(value: Value): number {
  if (value.kind === 'float') {
    return value.value;
  }
  return bitsToFloat(value.value);
}

export function valuesEqual(a: Value, b: Value): boolean {
  if (a.kind !== b.kind) {
    return false;
  }
  return Object.is(a.value, b.value);
}

/**
 * Render an unsigned 64-bit view as 0x-prefixed hex
 */
export function toHex(value: bigint): string {
  return `0x${BigInt.asUintN(64, value).toString(16)}`;
}
