import { MAX_HOME_DOMAIN_BYTES, type WireOperationBody, type WireSigner, type WireSignerKey } from '@txnkit/wire';
import { EncodingError, ValidationError } from '../errors/index.js';
import { decodeStrKey } from '../keys/index.js';
import { requireAccountId, requireByte, utf8Length, type BaseOperation } from './shared.js';

/**
 * Account authorization flags.
 */
export const AccountFlags = {
  authRequired: 1,
  authRevocable: 2,
  authImmutable: 4,
} as const;

export type AccountFlag = (typeof AccountFlags)[keyof typeof AccountFlags];

/**
 * A signer to add, update or (with weight 0) remove.
 * `key` is an account address, a pre-authorized transaction hash key (`T…`)
 * or a hash-x key (`X…`).
 */
export interface SignerSpec {
  readonly key: string;
  readonly weight: number;
}

/**
 * Sets account options. Only the fields that are present are changed.
 */
export interface SetOptionsOperation extends BaseOperation<'setOptions'> {
  readonly inflationDestination?: string;
  readonly setFlags?: readonly AccountFlag[];
  readonly clearFlags?: readonly AccountFlag[];
  readonly masterWeight?: number;
  readonly lowThreshold?: number;
  readonly mediumThreshold?: number;
  readonly highThreshold?: number;
  readonly homeDomain?: string;
  readonly signer?: SignerSpec;
}

export function setOptions(params: Omit<SetOptionsOperation, 'type'> = {}): SetOptionsOperation {
  return { type: 'setOptions', ...params };
}

function combineFlags(flags: readonly AccountFlag[] | undefined): number | null {
  if (flags === undefined) return null;
  let combined = 0;
  for (const flag of flags) {
    if (flag !== 1 && flag !== 2 && flag !== 4) {
      throw new ValidationError(`unknown account flag: ${String(flag)}`);
    }
    combined |= flag;
  }
  return combined;
}

function optionalByte(value: number | undefined, field: string): number | null {
  return value === undefined ? null : requireByte(value, field);
}

function signerKey(key: string): WireSignerKey {
  switch (key.charAt(0)) {
    case 'G':
      return { __kind: 'Ed25519', ed25519: decodeStrKey('ed25519PublicKey', key) };
    case 'T':
      return { __kind: 'PreAuthTx', preAuthTx: decodeStrKey('preAuthTx', key) };
    case 'X':
      return { __kind: 'HashX', hashX: decodeStrKey('sha256Hash', key) };
    default:
      throw new EncodingError(`unsupported signer key: ${key}`, { context: { key } });
  }
}

function toWireSigner(signer: SignerSpec | undefined): WireSigner | null {
  if (signer === undefined) return null;
  return { key: signerKey(signer.key), weight: requireByte(signer.weight, 'signer weight') };
}

export function convertSetOptions(op: SetOptionsOperation): WireOperationBody {
  if (op.homeDomain !== undefined && utf8Length(op.homeDomain) > MAX_HOME_DOMAIN_BYTES) {
    throw new ValidationError(`homeDomain must be at most ${MAX_HOME_DOMAIN_BYTES} bytes`, {
      homeDomain: op.homeDomain,
    });
  }
  return {
    __kind: 'SetOptions',
    inflationDest:
      op.inflationDestination === undefined ? null : requireAccountId(op.inflationDestination, 'inflationDestination'),
    clearFlags: combineFlags(op.clearFlags),
    setFlags: combineFlags(op.setFlags),
    masterWeight: optionalByte(op.masterWeight, 'masterWeight'),
    lowThreshold: optionalByte(op.lowThreshold, 'lowThreshold'),
    medThreshold: optionalByte(op.mediumThreshold, 'mediumThreshold'),
    highThreshold: optionalByte(op.highThreshold, 'highThreshold'),
    homeDomain: op.homeDomain ?? null,
    signer: toWireSigner(op.signer),
  };
}
