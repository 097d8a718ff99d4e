import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import { extractCaller } from '../decorators/caller.decorator';
import { QUIZ_CONFIG } from '../constants/quiz.constants';

@Injectable()
export class CallerGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    if (!extractCaller(request)) {
      throw new UnauthorizedException(
        `Unauthorized - No ${QUIZ_CONFIG.CALLER_HEADER} header provided`,
      );
    }

    return true;
  }
}
