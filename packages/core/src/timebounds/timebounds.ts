/**
 * Transaction validity windows.
 *
 * @packageDocumentation
 */

import { ConfigError, ValidationError } from '../errors/index.js';

/**
 * `maxTime` value meaning the transaction never expires.
 */
export const TIMEOUT_INFINITE = 0;

/**
 * Source of the current time in milliseconds. Defaults to `Date.now`.
 */
export type Clock = () => number;

const explicit = Symbol('timebounds.explicit');

/**
 * A validity window in unix seconds. `maxTime` of 0 means unbounded.
 *
 * Only the factories below mark an instance as explicitly constructed, and
 * only explicitly constructed timebounds pass {@link Timebounds.validate}.
 */
export class Timebounds {
  readonly minTime: number;
  readonly maxTime: number;
  readonly explicitlyConstructed: boolean;

  constructor(minTime = 0, maxTime = 0, token?: symbol) {
    this.minTime = minTime;
    this.maxTime = maxTime;
    this.explicitlyConstructed = token === explicit;
    Object.freeze(this);
  }

  /**
   * Throws if the window was not produced by a factory or is not a valid range.
   */
  validate(): void {
    if (!this.explicitlyConstructed) {
      throw new ConfigError(
        'timebounds must be constructed using setTimebounds(), setTimeout(), or setNoTimeout()',
        ['timebounds']
      );
    }
    if (this.minTime < 0) {
      throw new ValidationError('invalid timebound: minTime cannot be negative', { minTime: this.minTime });
    }
    if (this.maxTime < 0) {
      throw new ValidationError('invalid timebound: maxTime cannot be negative', { maxTime: this.maxTime });
    }
    if (this.maxTime !== TIMEOUT_INFINITE && this.maxTime < this.minTime) {
      throw new ValidationError('invalid timebound: maxTime < minTime', {
        minTime: this.minTime,
        maxTime: this.maxTime,
      });
    }
    if (!Number.isSafeInteger(this.minTime) || !Number.isSafeInteger(this.maxTime)) {
      throw new ValidationError('invalid timebound: bounds must be integers', {
        minTime: this.minTime,
        maxTime: this.maxTime,
      });
    }
  }

  /**
   * Wire form of the window.
   */
  toWire(): { minTime: bigint; maxTime: bigint } {
    return { minTime: BigInt(this.minTime), maxTime: BigInt(this.maxTime) };
  }
}

/**
 * Timebounds with an explicit range.
 */
export function setTimebounds(minTime: number, maxTime: number): Timebounds {
  return new Timebounds(minTime, maxTime, explicit);
}

/**
 * Timebounds expiring `timeoutSeconds` from now. The clock is read once, here.
 *
 * @example
 * ```ts
 * builder.setTimebounds(setTimeout(0, 300)); // valid for five minutes
 * ```
 */
export function setTimeout(minTime: number, timeoutSeconds: number, clock: Clock = Date.now): Timebounds {
  return new Timebounds(minTime, Math.floor(clock() / 1000) + timeoutSeconds, explicit);
}

/**
 * Timebounds with no expiry.
 */
export function setNoTimeout(minTime: number): Timebounds {
  return new Timebounds(minTime, TIMEOUT_INFINITE, explicit);
}
