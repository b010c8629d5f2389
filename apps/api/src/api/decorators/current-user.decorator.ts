import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import type { UserView } from '../../users/users.service';
import { InvalidTokenException } from '../../auth/exceptions/invalid-token.exception';

export type RequestUser = UserView;

export type AuthenticatedRequest = FastifyRequest<{ Params: { id?: string } }> & {
  user?: RequestUser;
};

export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser => {
    const { user } = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!user) {throw new InvalidTokenException('Missing or invalid authorization header');}
    return user;
  },
);
