/** No usable credentials on the request. Served as 401. */
export class AppUnauthorizedException extends Error {
  constructor(message = 'Not authenticated') {
    super(message);
    this.name = 'AppUnauthorizedException';
  }
}
