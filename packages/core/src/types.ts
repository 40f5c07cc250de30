/**
 * Core types for transaction building.
 *
 * @packageDocumentation
 */

/**
 * State tracking for transaction builder.
 * Used to ensure required fields are set before building.
 */
export interface BuilderState {
  sourceAccount?: boolean;
  timebounds?: boolean;
}

/**
 * Required state for a complete transaction: a source account, and either
 * timebounds or an explicit choice to go without them.
 */
export type RequiredState = {
  sourceAccount: true;
  timebounds: true;
};
