import { AppUnauthorizedException } from '../../exceptions/app-unauthorized.exception';

export class InvalidTokenException extends AppUnauthorizedException {
  constructor(message = 'Could not validate credentials') {
    super(message);
    this.name = 'InvalidTokenException';
  }
}
