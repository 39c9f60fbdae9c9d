import { Request, Response, NextFunction } from 'express';
import { distributionService, transactionService } from '@/config/dependencies';
import { currentUserId } from '@/middlewares/authenticate';
import { parseIdParam } from '@/utils/params';

/**
 * GET /api/v1/instruments/:instrumentId/distribution
 * Share of the instrument held by each of the user's portfolios and wallets
 */
export async function getDistribution(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = currentUserId(res);
    const instrumentId = parseIdParam(req.params.instrumentId, 'instrument ID');

    res.json(await transactionService.getDistribution(instrumentId, userId));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/instruments
 * Instruments the user holds in any portfolio or wallet
 */
export async function listUsedInstruments(
  _req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const instrumentIds = await distributionService.usedInstruments(currentUserId(res));

    res.json({ instrumentIds });
  } catch (error) {
    next(error);
  }
}
