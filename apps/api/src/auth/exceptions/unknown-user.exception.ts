import { AppUnauthorizedException } from '../../exceptions/app-unauthorized.exception';

export class UnknownUserException extends AppUnauthorizedException {
  constructor(message = 'User no longer exists') {
    super(message);
    this.name = 'UnknownUserException';
  }
}
