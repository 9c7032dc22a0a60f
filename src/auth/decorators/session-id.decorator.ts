import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { SessionRequest } from '../interfaces/session.interface';

/** Session id the guard attached to the request. */
export const SessionId = createParamDecorator((_data: unknown, context: ExecutionContext): string => {
  const request = context.switchToHttp().getRequest<SessionRequest>();
  if (!request.sessionId) {
    throw new UnauthorizedException('Not signed in');
  }
  return request.sessionId;
});
