/**
 * Assets: the native currency or a credit issued by an account.
 *
 * @packageDocumentation
 */

import type { WireAllowTrustAsset, WireAsset } from '@txnkit/wire';
import { ValidationError } from '../errors/index.js';
import { decodeAddress } from '../keys/index.js';

export interface NativeAsset {
  readonly type: 'native';
}

export interface CreditAsset {
  readonly type: 'credit';
  /**
   * 1-12 alphanumeric characters.
   */
  readonly code: string;
  /**
   * Address of the issuing account.
   */
  readonly issuer: string;
}

export type Asset = NativeAsset | CreditAsset;

const ASSET_CODE_PATTERN = /^[a-zA-Z0-9]{1,12}$/;

export function nativeAsset(): NativeAsset {
  return { type: 'native' };
}

export function creditAsset(code: string, issuer: string): CreditAsset {
  return { type: 'credit', code, issuer };
}

export function isNativeAsset(asset: Asset): asset is NativeAsset {
  return asset.type === 'native';
}

function encodeAssetCode(code: string): { kind: 'CreditAlphanum4' | 'CreditAlphanum12'; bytes: Uint8Array } {
  if (!ASSET_CODE_PATTERN.test(code)) {
    throw new ValidationError(`invalid asset code: ${code}`, { code });
  }
  const width = code.length <= 4 ? 4 : 12;
  const bytes = new Uint8Array(width);
  bytes.set(new TextEncoder().encode(code));
  return { kind: width === 4 ? 'CreditAlphanum4' : 'CreditAlphanum12', bytes };
}

/**
 * Convert an asset to its wire form.
 */
export function assetToWire(asset: Asset): WireAsset {
  if (asset.type === 'native') {
    return { __kind: 'Native' };
  }
  const { kind, bytes } = encodeAssetCode(asset.code);
  return { __kind: kind, assetCode: bytes, issuer: decodeAddress(asset.issuer) };
}

/**
 * Convert an issued asset to the code-only form used by allow-trust.
 */
export function assetToAllowTrustWire(asset: Asset): WireAllowTrustAsset {
  if (asset.type === 'native') {
    throw new ValidationError("Trustline doesn't exist for a native asset");
  }
  const { kind, bytes } = encodeAssetCode(asset.code);
  return { __kind: kind, assetCode: bytes };
}

/**
 * Human-readable asset label, `native` or `CODE:ISSUER`.
 */
export function assetToString(asset: Asset): string {
  return asset.type === 'native' ? 'native' : `${asset.code}:${asset.issuer}`;
}
