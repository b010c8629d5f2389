import { AppConflictException } from '../../exceptions/app-conflict.exception';

/** The (user, project) pair already has a membership row. */
export class AlreadyMemberException extends AppConflictException {
  constructor(message = 'User is already a member of the project') {
    super(message);
    this.name = 'AlreadyMemberException';
  }
}
