import { Request } from 'express';
import { z } from 'zod';
import { Caller } from '../types';
import { HttpError } from './errorHandler';

const callerHeaders = z.object({
  'x-caller-id': z.coerce.number().int().positive(),
  'x-caller-role': z.enum(['hr', 'manager', 'employee']),
});

/**
 * Read the caller identity that the upstream auth layer puts on every request.
 */
export function callerFrom(req: Request): Caller {
  const parsed = callerHeaders.safeParse(req.headers);
  if (!parsed.success) {
    throw new HttpError(401, 'Missing or invalid x-caller-id / x-caller-role headers');
  }
  return { id: parsed.data['x-caller-id'], role: parsed.data['x-caller-role'] };
}
