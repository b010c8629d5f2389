/** The caller is known but lacks the membership or role the action needs. Served as 403. */
export class AppForbiddenException extends Error {
  constructor(message = 'Not authorized') {
    super(message);
    this.name = 'AppForbiddenException';
  }
}
