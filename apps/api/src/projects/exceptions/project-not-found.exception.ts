import { AppNotFoundException } from '../../exceptions/app-not-found.exception';

/** No project with the requested id. Raised before any membership check. */
export class ProjectNotFoundException extends AppNotFoundException {
  constructor(message = 'Project not found') {
    super(message);
    this.name = 'ProjectNotFoundException';
  }
}
