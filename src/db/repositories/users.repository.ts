import { DocumentStore } from '../documentStore.js';
import { UserCollection } from '../schemas.js';
import { Stored, User } from '../types/ctf.types.js';

export class UsersRepository {
  constructor(private readonly store: DocumentStore) {}

  async findByUsernameOrEmail(username: string, email: string): Promise<Stored<User> | null> {
    return this.store.findOne(UserCollection, { $or: [{ username }, { email }] });
  }

  async findByCredentials(username: string, passwordHash: string): Promise<Stored<User> | null> {
    return this.store.findOne(UserCollection, { username, password_hash: passwordHash });
  }

  async create(user: User): Promise<string> {
    return this.store.create(UserCollection, user);
  }
}
