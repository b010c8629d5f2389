import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthorizationService, type ProjectAccessLevel } from '../../authorization/authorization.service';
import { InvalidTokenException } from '../../auth/exceptions/invalid-token.exception';
import { parseProjectId } from '../pipes/parse-project-id.pipe';
import { REQUIRED_ROLE_KEY } from '../decorators/require-role.decorator';
import type { AuthenticatedRequest } from '../decorators/current-user.decorator';

/** Requires membership of the project in `:id`, or ownership under `@RequireRole('owner')`. */
@Injectable()
export class ProjectMemberGuard implements CanActivate {
  constructor(
    private readonly authorizationService: AuthorizationService,
    private readonly reflector: Reflector,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = request.user;
    if (!user) throw new InvalidTokenException('Missing or invalid authorization header');

    const projectId = parseProjectId(request.params.id);

    const requiredRole = this.reflector.getAllAndOverride<
      ProjectAccessLevel | undefined
    >(REQUIRED_ROLE_KEY, [context.getHandler(), context.getClass()]);

    await this.authorizationService.authorize(user.id, projectId, requiredRole ?? 'member');
    return true;
  }
}
