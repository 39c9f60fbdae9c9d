import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { Owner, Position } from '@/models';
import { ValidationError } from '@/errors';
import { openPositionSchema } from '@/validators/owner.validator';
import { OwnerService } from '@/services/owner.service';
import { currentUserId } from '@/middlewares/authenticate';
import { parseIdParam } from '@/utils/params';

export interface OwnerController {
  list: RequestHandler;
  get: RequestHandler;
  create: RequestHandler;
  update: RequestHandler;
  remove: RequestHandler;
  getPosition: RequestHandler;
  addPosition: RequestHandler;
  removePosition: RequestHandler;
}

/**
 * Handlers shared by /portfolios and /wallets
 *
 * @param noun - Used in validation messages ("Invalid portfolio data")
 */
export function createOwnerController<O extends Owner, I extends { name: string }, P extends Position>(
  service: OwnerService<O, I, P>,
  schema: z.ZodType<I, z.ZodTypeDef, unknown>,
  noun: string
): OwnerController {
  const parsePayload = (body: unknown): I => {
    const validationResult = schema.safeParse(body);

    if (!validationResult.success) {
      throw new ValidationError(`Invalid ${noun} data`, validationResult.error.flatten());
    }
    return validationResult.data;
  };

  const ownerId = (req: Request): number => parseIdParam(req.params.id, `${noun} ID`);

  return {
    async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        res.json(await service.list(currentUserId(res)));
      } catch (error) {
        next(error);
      }
    },

    async get(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        res.json(await service.get(currentUserId(res), ownerId(req)));
      } catch (error) {
        next(error);
      }
    },

    async create(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const owner = await service.create(currentUserId(res), parsePayload(req.body));
        res.status(201).json(owner);
      } catch (error) {
        next(error);
      }
    },

    async update(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const id = ownerId(req);
        res.json(await service.update(currentUserId(res), id, parsePayload(req.body)));
      } catch (error) {
        next(error);
      }
    },

    async remove(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        await service.delete(currentUserId(res), ownerId(req));
        res.status(204).send();
      } catch (error) {
        next(error);
      }
    },

    async getPosition(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const id = ownerId(req);
        const instrumentId = parseIdParam(req.params.instrumentId, 'instrument ID');
        res.json(await service.getPosition(currentUserId(res), id, instrumentId));
      } catch (error) {
        next(error);
      }
    },

    async addPosition(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const id = ownerId(req);
        const validationResult = openPositionSchema.safeParse(req.body);

        if (!validationResult.success) {
          throw new ValidationError('Invalid position data', validationResult.error.flatten());
        }

        const position = await service.addPosition(
          currentUserId(res),
          id,
          validationResult.data.instrumentId
        );
        res.status(201).json(position);
      } catch (error) {
        next(error);
      }
    },

    async removePosition(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const id = ownerId(req);
        const instrumentId = parseIdParam(req.params.instrumentId, 'instrument ID');
        await service.removePosition(currentUserId(res), id, instrumentId);
        res.status(204).send();
      } catch (error) {
        next(error);
      }
    },
  };
}
