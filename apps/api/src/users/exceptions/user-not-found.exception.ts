import { AppNotFoundException } from '../../exceptions/app-not-found.exception';

export class UserNotFoundException extends AppNotFoundException {
  constructor(message = 'User not found') {
    super(message);
    this.name = 'UserNotFoundException';
  }
}
