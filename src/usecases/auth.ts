import type { IAuthService } from '../ports/auth';
import type { IPasswordHasher } from '../ports/crypto';
import type { IDataStore } from '../ports/datastore';
import type { Session, User } from '../domain/types';
import { AuthorizationError } from '../domain/errors';
import { credentialsSchema, parseInput } from '../domain/schemas';

export class AuthService implements IAuthService {
  constructor(
    private readonly store: IDataStore,
    private readonly hasher: IPasswordHasher,
  ) {}

  async register(username: string, password: string): Promise<User> {
    const input = parseInput(credentialsSchema, { username, password });
    const passwordHash = await this.hasher.hash(input.password);
    return this.store.createUser({ username: input.username, passwordHash });
  }

  async login(username: string, password: string): Promise<Session> {
    const user = await this.store.findUserByUsername(username.trim());
    if (!user || !(await this.hasher.verify(password, user.passwordHash))) {
      throw new AuthorizationError('Invalid username or password.');
    }
    return { userId: user.id, username: user.username };
  }

  async requireSession(session: Session | null): Promise<Session> {
    if (!session) throw new AuthorizationError('Please log in first.');
    const user = await this.store.findUserById(session.userId);
    if (!user || user.username !== session.username) {
      throw new AuthorizationError('Session does not match a registered user.');
    }
    return session;
  }
}
