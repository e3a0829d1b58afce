import type { Session, User } from '../domain/types';

export interface IAuthService {
  register(username: string, password: string): Promise<User>;
  login(username: string, password: string): Promise<Session>;
  /** Throws AuthorizationError unless the session names an existing user. */
  requireSession(session: Session | null): Promise<Session>;
}
