import { AppForbiddenException } from '../../exceptions/app-forbidden.exception';

export class InactiveAccountException extends AppForbiddenException {
  constructor(message = 'Account is inactive') {
    super(message);
    this.name = 'InactiveAccountException';
  }
}
