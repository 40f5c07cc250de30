/**
 * Big-endian, 4-byte aligned primitives built on @solana/codecs.
 *
 * Every multi-byte integer on the wire is big-endian and every variable-length
 * field is padded with zero bytes to a multiple of four.
 *
 * @packageDocumentation
 */

import {
  Endian,
  combineCodec,
  createDecoder,
  createEncoder,
  fixCodecSize,
  getBooleanCodec,
  getBytesCodec,
  getI32Codec,
  getI64Codec,
  getNullableCodec,
  getArrayCodec,
  getU32Codec,
  getU64Codec,
  transformCodec,
  type Codec,
  type ReadonlyUint8Array,
} from '@solana/codecs';
import { getUtf8Codec } from '@solana/codecs-strings';

const BIG_ENDIAN = { endian: Endian.Big };

/**
 * Thrown by the wire codecs when a value cannot be represented.
 */
export class WireCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireCodecError';
    Object.setPrototypeOf(this, WireCodecError.prototype);
  }
}

export const getInt32Codec = () => getI32Codec(BIG_ENDIAN);
export const getUint32Codec = () => getU32Codec(BIG_ENDIAN);
export const getInt64Codec = () => getI64Codec(BIG_ENDIAN);
export const getUint64Codec = () => getU64Codec(BIG_ENDIAN);

/**
 * Booleans occupy a full 32-bit word.
 */
export const getWireBooleanCodec = () => getBooleanCodec({ size: getUint32Codec() });

/**
 * Fixed-length opaque data. Only used with sizes that are already 4-byte aligned.
 */
export function getFixedOpaqueCodec(size: number): Codec<ReadonlyUint8Array> {
  return fixCodecSize(getBytesCodec(), size);
}

function paddingFor(length: number): number {
  return (4 - (length % 4)) % 4;
}

/**
 * Variable-length opaque data: a uint32 length, the bytes, then zero padding.
 */
export function getVarOpaqueCodec(maxLength: number): Codec<ReadonlyUint8Array> {
  const lengthCodec = getUint32Codec();

  const encoder = createEncoder<ReadonlyUint8Array>({
    getSizeFromValue: (value) => 4 + value.length + paddingFor(value.length),
    write(value, bytes, offset) {
      if (value.length > maxLength) {
        throw new WireCodecError(`opaque value of ${value.length} bytes exceeds maximum of ${maxLength}`);
      }
      let cursor = lengthCodec.write(value.length, bytes, offset);
      bytes.set(value, cursor);
      cursor += value.length;
      const padding = paddingFor(value.length);
      bytes.fill(0, cursor, cursor + padding);
      return cursor + padding;
    },
  });

  const decoder = createDecoder<ReadonlyUint8Array>({
    read(bytes, offset) {
      const [length, start] = lengthCodec.read(bytes, offset);
      if (length > maxLength) {
        throw new WireCodecError(`opaque value of ${length} bytes exceeds maximum of ${maxLength}`);
      }
      const end = start + length;
      if (end > bytes.length) {
        throw new WireCodecError(`opaque value of ${length} bytes overruns the buffer`);
      }
      return [bytes.slice(start, end), end + paddingFor(length)];
    },
  });

  return combineCodec(encoder, decoder);
}

/**
 * Length-limited string, carried as UTF-8 variable-length opaque data.
 */
export function getWireStringCodec(maxLength: number): Codec<string> {
  const utf8 = getUtf8Codec();
  return transformCodec(
    getVarOpaqueCodec(maxLength),
    (value: string) => utf8.encode(value),
    (bytes) => utf8.decode(bytes)
  );
}

/**
 * Optional values are prefixed with a 32-bit presence flag.
 */
export function getOptionalCodec<T>(item: Codec<T>): Codec<T | null> {
  return getNullableCodec(item, { prefix: getUint32Codec() });
}

/**
 * Variable-length arrays are prefixed with a uint32 element count.
 */
export function getVarArrayCodec<T>(item: Codec<T>, maxLength: number): Codec<T[]> {
  return transformCodec(
    getArrayCodec(item, { size: getUint32Codec() }),
    (values: T[]) => {
      if (values.length > maxLength) {
        throw new WireCodecError(`array of ${values.length} elements exceeds maximum of ${maxLength}`);
      }
      return values;
    }
  );
}
