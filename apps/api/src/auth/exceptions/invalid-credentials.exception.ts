import { AppBadRequestException } from '../../exceptions/app-bad-request.exception';

export class InvalidCredentialsException extends AppBadRequestException {
  constructor(message = 'Incorrect username or password') {
    super(message);
    this.name = 'InvalidCredentialsException';
  }
}
