/**
 * @swapvault/ledger
 *
 * Share ledger and deterministic fixed-point arithmetic.
 *
 * Design rules:
 * - All amounts are bigint, never floating point
 * - Balances never go negative
 * - Balances always sum to the total supply
 * - Fail-closed on every invalid operation
 */

export { ShareLedger } from "./share-ledger.js";

export {
  DEFAULT_PRECISION,
  MAX_UINT256,
  bpsOf,
  calculateMantissa,
  formatUnits,
  mulDiv,
  multiplyByMantissa,
  parseUnits,
  pow10,
} from "./fixed-point.js";
export type { RoundingMode } from "./fixed-point.js";

export { LedgerError } from "./types.js";
export type {
  AllowanceRecord,
  HolderBalance,
  LedgerErrorCode,
  LedgerSnapshot,
} from "./types.js";
