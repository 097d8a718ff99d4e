import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { QUIZ_CONFIG } from '../constants/quiz.constants';

/**
 * Reads the opaque caller identity the host attaches to every request.
 * Returns undefined when the header is absent or blank.
 */
export function extractCaller(
  request: Pick<Request, 'headers'>,
): string | undefined {
  const header = request.headers[QUIZ_CONFIG.CALLER_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  const caller = value?.trim();
  return caller ? caller : undefined;
}

export const Caller = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string | undefined =>
    extractCaller(context.switchToHttp().getRequest<Request>()),
);
