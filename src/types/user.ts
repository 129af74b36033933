/**
 * Resource owner as seen by the authorization server.
 * Users are managed elsewhere; the server only needs a stable subject.
 */
export interface User {
  id: string;
  username?: string;
  name?: string;
  email?: string;
}
