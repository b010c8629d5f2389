/** The write collides with existing state. Served as 400 alongside other client errors. */
export class AppConflictException extends Error {
  constructor(message = 'Conflicts with an existing record') {
    super(message);
    this.name = 'AppConflictException';
  }
}
