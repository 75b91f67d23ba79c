export { MarginLedger, normalizeSymbol } from './MarginLedger';
export type { CreateMarketInput, LedgerResult, MarginLedgerOptions, OpenPositionRequest } from './MarginLedger';
export { CapabilityRegistry } from './Capabilities';
export type { CapabilityHolders } from './Capabilities';
export { ManualClock, MonotonicClock } from './Clock';
export type { Clock } from './Clock';
export { MarginEngineError, isMarginEngineError } from './errors';
export type { MarginErrorCode } from './errors';
export { isDirection } from './PositionEngine';
export type { ClosePositionResult, LiquidationResult, OpenPositionResult } from './PositionEngine';
export * from './types';
