import { Module, HttpStatus } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AuthModule } from '../auth/auth.module';
import { UsersModule } from '../users/users.module';
import { MembersModule } from '../members/members.module';
import { ProjectsModule } from '../projects/projects.module';
import { DocumentsModule } from '../documents/documents.module';
import { AuthorizationModule } from '../authorization/authorization.module';
import { AuthController } from './controllers/auth.controller';
import { ProjectsController } from './controllers/projects.controller';
import { MembersController } from './controllers/members.controller';
import { DocumentsController } from './controllers/documents.controller';
import { ProjectMemberGuard } from './guards/project-member.guard';
import { createHttpFilter } from './filters/create-http-filter';
import { AppNotFoundException } from '../exceptions/app-not-found.exception';
import { AppConflictException } from '../exceptions/app-conflict.exception';
import { AppForbiddenException } from '../exceptions/app-forbidden.exception';
import { AppUnauthorizedException } from '../exceptions/app-unauthorized.exception';
import { AppBadRequestException } from '../exceptions/app-bad-request.exception';

const NotFoundFilter = createHttpFilter(HttpStatus.NOT_FOUND, AppNotFoundException);
const ForbiddenFilter = createHttpFilter(HttpStatus.FORBIDDEN, AppForbiddenException);
const UnauthorizedFilter = createHttpFilter(HttpStatus.UNAUTHORIZED, AppUnauthorizedException);
// Conflicts share 400 with the other client errors.
const BadRequestFilter = createHttpFilter(HttpStatus.BAD_REQUEST, AppBadRequestException, AppConflictException);

@Module({
  imports: [
    AuthModule,
    UsersModule,
    MembersModule,
    ProjectsModule,
    DocumentsModule,
    AuthorizationModule,
  ],
  controllers: [
    AuthController,
    ProjectsController,
    MembersController,
    DocumentsController,
  ],
  providers: [
    ProjectMemberGuard,
    { provide: APP_FILTER, useClass: NotFoundFilter },
    { provide: APP_FILTER, useClass: ForbiddenFilter },
    { provide: APP_FILTER, useClass: UnauthorizedFilter },
    { provide: APP_FILTER, useClass: BadRequestFilter },
  ],
})
export class ApiModule {}
