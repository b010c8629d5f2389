import { AppForbiddenException } from './app-forbidden.exception';

export class InsufficientPermissionsException extends AppForbiddenException {
  constructor(message = 'Not authorized to perform this action') {
    super(message);
    this.name = 'InsufficientPermissionsException';
  }
}
