import { AppConflictException } from '../../exceptions/app-conflict.exception';

export class OwnerAlreadyAssignedException extends AppConflictException {
  constructor(message = 'Project already has an owner') {
    super(message);
    this.name = 'OwnerAlreadyAssignedException';
  }
}
