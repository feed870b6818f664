import type { Request } from 'express';
import { InvalidOperationError } from '@dashcam/common-types';

/**
 * JSONボディをオブジェクトとして取り出す（ボディなしは空オブジェクト）
 */
export function readJsonBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (body === undefined || body === null) {
    return {};
  }
  if (typeof body !== 'object' || Array.isArray(body)) {
    throw new InvalidOperationError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}
