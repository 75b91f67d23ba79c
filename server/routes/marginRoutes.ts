import { Router, type NextFunction, type Request, type Response } from 'express';

import { isMarginEngineError } from '../margin/errors';
import type { Caller } from '../margin/types';
import {
  parseBoolean,
  parseDirection,
  parseLeverage,
  parseRole,
  parseU64,
  requireString,
} from '../service/requestParsing';
import type { MarginService } from '../service/MarginService';
import { type Logger, serializeError } from '../utils/logger';

type Handler = (req: Request, res: Response) => Promise<unknown> | unknown;

function callerOf(res: Response): Caller {
  return { account: String(res.locals.account) };
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null ? { ...body } : {};
}

export function sendError(res: Response, error: unknown, log: Logger): void {
  if (isMarginEngineError(error)) {
    res.status(error.statusCode).json({
      ok: false,
      error: error.code,
      message: error.message,
      details: error.details ?? null,
    });
    return;
  }
  log.error('HTTP_HANDLER_ERROR', { error: serializeError(error) });
  res.status(500).json({ ok: false, error: 'internal_error', message: 'Unexpected server error.' });
}

export function createMarginRouter(service: MarginService, log: Logger): Router {
  const router = Router();

  const handle = (fn: Handler) => (req: Request, res: Response, _next: NextFunction): void => {
    Promise.resolve()
      .then(() => fn(req, res))
      .then((data) => {
        res.json({ ok: true, data });
      })
      .catch((error: unknown) => sendError(res, error, log));
  };

  router.get('/overview', handle(() => service.overview()));

  router.get('/me', handle((_req, res) => {
    const { account } = callerOf(res);
    return { account, roles: service.rolesOf(account) };
  }));

  // Pools

  router.post('/pools', handle((req, res) => {
    const body = bodyOf(req);
    return service.createLiquidityPool(callerOf(res), requireString(body.asset, 'asset'));
  }));

  router.get('/pools/:asset', handle((req) => service.describePool(req.params.asset)));

  router.post('/pools/:asset/liquidity/add', handle((req, res) => {
    const body = bodyOf(req);
    return service.addLiquidity(callerOf(res), req.params.asset, parseU64(body.amount, 'amount'));
  }));

  router.post('/pools/:asset/liquidity/remove', handle((req, res) => {
    const body = bodyOf(req);
    return service.removeLiquidity(callerOf(res), req.params.asset, parseU64(body.amount, 'amount'));
  }));

  // Markets

  router.post('/markets', handle((req, res) => {
    const body = bodyOf(req);
    return service.createMarket(callerOf(res), {
      symbol: requireString(body.symbol, 'symbol'),
      asset: requireString(body.asset, 'asset'),
      leverage: parseLeverage(body.leverage),
    });
  }));

  router.get('/markets/:symbol', handle((req) => service.describeMarket(req.params.symbol)));

  router.post('/markets/:symbol/paused', handle((req, res) => {
    const body = bodyOf(req);
    return service.setPaused(callerOf(res), req.params.symbol, parseBoolean(body.paused, 'paused'));
  }));

  router.post('/markets/:symbol/leverage', handle((req, res) => {
    const body = bodyOf(req);
    return service.editMarketLeverage(callerOf(res), req.params.symbol, parseLeverage(body.leverage));
  }));

  // Positions

  router.get('/markets/:symbol/positions', handle((req) => service.listPositions(req.params.symbol)));

  router.get('/markets/:symbol/positions/:owner', handle((req) => service.getPosition(req.params.symbol, req.params.owner)));

  router.post('/markets/:symbol/positions/open', handle((req, res) => {
    const body = bodyOf(req);
    return service.openPosition(callerOf(res), req.params.symbol, {
      size: parseU64(body.size, 'size', 'InvalidSize'),
      direction: parseDirection(body.direction),
      collateral: parseU64(body.collateral, 'collateral', 'InvalidCollateral'),
    });
  }));

  router.post('/markets/:symbol/positions/close', handle((req, res) => service.closePosition(callerOf(res), req.params.symbol)));

  router.post('/markets/:symbol/positions/:owner/liquidate', handle((req, res) =>
    service.liquidate(callerOf(res), req.params.symbol, req.params.owner)
  ));

  // Oracle

  router.post('/feeds', handle((req, res) => {
    const body = bodyOf(req);
    return service.createPriceFeed(callerOf(res), requireString(body.symbol, 'symbol'));
  }));

  router.get('/feeds/:symbol', handle((req) => service.describeFeed(req.params.symbol)));

  router.post('/feeds/:symbol/price', handle((req, res) => {
    const body = bodyOf(req);
    return service.updatePrice(callerOf(res), req.params.symbol, parseU64(body.price, 'price', 'InvalidPrice'));
  }));

  // Capabilities

  router.post('/capabilities/:role/transfer', handle((req, res) => {
    const body = bodyOf(req);
    return service.transferCapability(callerOf(res), parseRole(req.params.role), requireString(body.to, 'to'));
  }));

  return router;
}
