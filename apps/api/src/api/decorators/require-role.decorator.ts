import { SetMetadata } from '@nestjs/common';
import type { ProjectAccessLevel } from '../../authorization/authorization.service';

export const REQUIRED_ROLE_KEY = 'requiredRole';
export const RequireRole = (role: ProjectAccessLevel) => SetMetadata(REQUIRED_ROLE_KEY, role);
