export type MarginErrorCode =
  | 'Unauthorized'
  | 'MarketPaused'
  | 'ZeroAmount'
  | 'InvalidSize'
  | 'InvalidDirection'
  | 'InvalidPrice'
  | 'InvalidCollateral'
  | 'InvalidLeverage'
  | 'InvalidRequest'
  | 'DirectionMismatch'
  | 'PositionNotFound'
  | 'InsufficientLiquidity'
  | 'StaleUpdate'
  | 'CannotLiquidate'
  | 'ArithmeticOverflow'
  | 'AssetMismatch'
  | 'AlreadyExists'
  | 'MarketNotFound'
  | 'PoolNotFound'
  | 'PriceFeedNotFound';

const STATUS_BY_CODE: Record<MarginErrorCode, number> = {
  Unauthorized: 403,
  MarketPaused: 409,
  ZeroAmount: 400,
  InvalidSize: 400,
  InvalidDirection: 400,
  InvalidPrice: 400,
  InvalidCollateral: 400,
  InvalidLeverage: 400,
  InvalidRequest: 400,
  DirectionMismatch: 409,
  PositionNotFound: 404,
  InsufficientLiquidity: 409,
  StaleUpdate: 409,
  CannotLiquidate: 409,
  ArithmeticOverflow: 400,
  AssetMismatch: 400,
  AlreadyExists: 409,
  MarketNotFound: 404,
  PoolNotFound: 404,
  PriceFeedNotFound: 404,
};

/**
 * Every rejected call surfaces as one of these. The ledger rolls back the
 * whole call before it reaches the caller.
 */
export class MarginEngineError extends Error {
  readonly name = 'MarginEngineError';
  readonly statusCode: number;

  constructor(
    readonly code: MarginErrorCode,
    message: string = code,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export function isMarginEngineError(error: unknown): error is MarginEngineError {
  return error instanceof MarginEngineError;
}

export function fail(code: MarginErrorCode, message?: string, details?: Record<string, unknown>): never {
  throw new MarginEngineError(code, message ?? code, details);
}
