/**
 * @swapvault/runtime
 *
 * In-process stand-in for the execution platform: atomic frames with
 * rollback, a reentrancy guard, address allocation, a token registry,
 * and reference token and yield-source implementations.
 */

export { ExecutionEnvironment } from "./environment.js";
export type { ExecutionEnvironmentOptions } from "./environment.js";

export { ReentrancyGuard } from "./reentrancy.js";

export { RuntimeError } from "./errors.js";
export type { RuntimeErrorCode } from "./errors.js";

export type { FungibleToken, Journaled, YieldSource } from "./interfaces.js";

export { InMemoryToken } from "./token.js";
export type { InMemoryTokenOptions } from "./token.js";

export { InMemoryYieldSource } from "./yield-source.js";
export type { InMemoryYieldSourceOptions } from "./yield-source.js";
