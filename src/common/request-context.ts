import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Request } from 'express';

export interface RequestContext {
  requestId: string;
  path: string;
}

const REQUEST_ID_HEADER = 'x-request-id';

export function resolveRequestContext(req: Request): RequestContext {
  const header = req.headers[REQUEST_ID_HEADER];
  const requestId = typeof header === 'string' && header.trim().length > 0 ? header.trim() : randomUUID();

  return {
    requestId,
    path: req.originalUrl ?? req.url,
  };
}

/** Context for work that does not originate from an HTTP request (CLI imports). */
export function createDetachedContext(path: string): RequestContext {
  return { requestId: randomUUID(), path };
}

export const ReqContext = createParamDecorator((_data: unknown, ctx: ExecutionContext): RequestContext => {
  return resolveRequestContext(ctx.switchToHttp().getRequest<Request>());
});
