import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { IdempotencyKey } from '../models/index.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { logger } from '../utils/logger.js';
import { isDuplicateKeyError } from './errorHandler.js';

const KEY_TTL_MS = 24 * 60 * 60 * 1000;

export function hashRequestBody(body: unknown): string {
  return crypto.createHash('sha256').update(JSON.stringify(body ?? {})).digest('hex');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface IdempotencyRequest {
  key: string;
  userId: string;
  endpoint: string;
  requestHash: string;
}

export type IdempotencyClaim =
  | { kind: 'reserved'; settle: (status: number, body: unknown) => Promise<void> }
  | { kind: 'replay'; status: number; body: unknown };

/**
 * Reserves an idempotency key with a unique insert. A key that is already
 * stored is replayed once its first request has succeeded; while that request
 * is still running, or when the body differs, the claim is refused.
 */
export async function claimIdempotencyKey(request: IdempotencyRequest): Promise<IdempotencyClaim> {
  const { key, userId, endpoint, requestHash } = request;

  try {
    const reserved = await IdempotencyKey.create({
      key,
      userId,
      endpoint,
      requestHash,
      expiresAt: new Date(Date.now() + KEY_TTL_MS),
    });

    const settle = async (status: number, body: unknown): Promise<void> => {
      // A failed response releases the key so the client can retry
      if (status >= 400) {
        await IdempotencyKey.deleteOne({ _id: reserved._id });
        return;
      }
      await IdempotencyKey.updateOne(
        { _id: reserved._id },
        { $set: { responseStatus: status, responseBody: isRecord(body) ? body : { value: body } } },
      );
    };

    return { kind: 'reserved', settle };
  } catch (error) {
    if (!(error instanceof Error) || !isDuplicateKeyError(error)) throw error;
  }

  const existing = await IdempotencyKey.findOne({ key, userId });

  if (existing && existing.requestHash !== requestHash) {
    throw AppError.conflict('Idempotency-Key was already used with a different request', ErrorCode.IDEMPOTENCY_CONFLICT);
  }
  if (!existing || existing.responseStatus === undefined) {
    throw AppError.conflict('A request with this Idempotency-Key is still being processed', ErrorCode.IDEMPOTENCY_CONFLICT);
  }

  return { kind: 'replay', status: existing.responseStatus, body: existing.responseBody };
}

/**
 * Idempotency middleware for order intake, payments and claims.
 * An `Idempotency-Key` header is optional; without one the request runs as usual.
 */
export const idempotent = () => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const key = req.headers['idempotency-key'];

    if (typeof key !== 'string' || !key) {
      next();
      return;
    }

    if (!req.userId) {
      next(AppError.unauthorized());
      return;
    }

    let claim: IdempotencyClaim;
    try {
      claim = await claimIdempotencyKey({
        key,
        userId: req.userId,
        endpoint: `${req.method} ${req.originalUrl}`,
        requestHash: hashRequestBody(req.body),
      });
    } catch (error) {
      next(error);
      return;
    }

    if (claim.kind === 'replay') {
      res.status(claim.status).json(claim.body);
      return;
    }

    const { settle } = claim;
    const originalJson = res.json.bind(res);
    res.json = (body: unknown) => {
      settle(res.statusCode, body).catch((storeError: unknown) => {
        logger.warn({ key, err: storeError }, 'Failed to settle idempotency key');
      });

      return originalJson(body);
    };

    next();
  };
};
