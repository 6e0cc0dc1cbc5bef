// src/services/auth.service.ts
import { PasswordHasher } from '../utils/passwordHasher';
import { SessionTokenManager } from './token.service';
import { DocumentCollection } from './documentStore';
import { ConnectionRegistry } from '../sockets/connectionRegistry';
import { credentialBody, toCredential } from '../models/User';

export interface AuthResponse {
  userId: string;
  token: string;
}

export interface AuthServiceDependencies {
  users: DocumentCollection;
  hasher: PasswordHasher;
  tokens: SessionTokenManager;
  registry: ConnectionRegistry;
}

export class AuthService {
  constructor(private readonly deps: AuthServiceDependencies) {}

  /**
   * Stores a new credential. Fails with a Conflict StoreError when the
   * username is taken.
   */
  async register(username: string, password: string): Promise<AuthResponse> {
    const { hash, salt } = await this.deps.hasher.hash(password);
    const user = await this.deps.users.insert(credentialBody(username, hash, salt), { username });

    console.log(`[AUTH] Registered ${username}`);
    return { userId: user.id, token: this.deps.tokens.issue(username) };
  }

  /**
   * Returns null for an unknown user or a wrong password.
   */
  async login(username: string, password: string): Promise<AuthResponse | null> {
    const doc = await this.deps.users.findOne({ username });
    const credential = doc ? toCredential(doc) : null;
    if (!credential) {
      return null;
    }

    const matches = await this.deps.hasher.compare(password, credential.salt, credential.password);
    if (!matches) {
      return null;
    }

    return { userId: credential.id, token: this.deps.tokens.issue(username) };
  }

  /**
   * Revokes the token and disconnects every real-time connection of its owner.
   */
  async logout(token: string): Promise<number> {
    const identity = this.deps.tokens.validate(token);
    this.deps.tokens.revoke(token);

    const disconnected = await this.deps.registry.retireByIdentity(identity);
    console.log(`[AUTH] ${identity} logged out, ${disconnected} connection(s) closed`);
    return disconnected;
  }
}
