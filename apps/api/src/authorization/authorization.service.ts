import { Injectable, Logger } from '@nestjs/common';
import { TokenService } from '../auth/token.service';
import { UnknownUserException } from '../auth/exceptions/unknown-user.exception';
import { InactiveAccountException } from '../auth/exceptions/inactive-account.exception';
import { UsersService, toUserView, type UserView } from '../users/users.service';
import { MembersService } from '../members/members.service';
import { ProjectsService } from '../projects/projects.service';
import { ProjectNotFoundException } from '../projects/exceptions/project-not-found.exception';
import { InsufficientPermissionsException } from '../exceptions/insufficient-permissions.exception';

/** Minimum relation to a project an operation requires. */
export type ProjectAccessLevel = 'member' | 'owner';

/**
 * Resolves the acting user from a bearer token and decides whether that user
 * may act on a project. Failures stay distinguishable: 401 for the token,
 * 404 for a missing project, 403 for a missing membership or owner flag.
 */
@Injectable()
export class AuthorizationService {
  private readonly logger = new Logger(AuthorizationService.name);

  constructor(
    private readonly tokenService: TokenService,
    private readonly usersService: UsersService,
    private readonly membersService: MembersService,
    private readonly projectsService: ProjectsService,
  ) {}

  async currentUser(token: string): Promise<UserView> {
    const email = this.tokenService.validate(token);

    const user = await this.usersService.findByEmail(email);
    if (!user) {
      this.logger.warn('Token subject no longer exists');
      throw new UnknownUserException();
    }
    if (!user.active) {
      this.logger.warn({ userId: user.id }, 'Token presented for inactive account');
      throw new InactiveAccountException();
    }
    return toUserView(user);
  }

  async isMember(userId: number, projectId: number): Promise<boolean> {
    return (await this.membersService.getMembership(userId, projectId)) !== null;
  }

  async isOwner(userId: number, projectId: number): Promise<boolean> {
    const membership = await this.membersService.getMembership(userId, projectId);
    return membership?.is_owner === true;
  }

  async authorize(userId: number, projectId: number, level: ProjectAccessLevel): Promise<void> {
    if (!(await this.projectsService.exists(projectId))) {
      throw new ProjectNotFoundException();
    }

    const membership = await this.membersService.getMembership(userId, projectId);
    if (!membership) {
      this.logger.warn({ userId, projectId, level }, 'Access denied: not a member');
      throw new InsufficientPermissionsException();
    }
    if (level === 'owner' && !membership.is_owner) {
      this.logger.warn({ userId, projectId, level }, 'Access denied: not the owner');
      throw new InsufficientPermissionsException();
    }
  }
}
