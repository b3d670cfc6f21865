/** Secret lookup keyed by account. Passwords never go through settings.json. */
export interface CredentialStore {
  getPassword(account: string): Promise<string | null>;
}

/**
 * Reads MAILWATCH_PASSWORD, optionally scoped to one account through
 * MAILWATCH_PASSWORD_ACCOUNT.
 */
export class EnvCredentialStore implements CredentialStore {
  constructor(private env: NodeJS.ProcessEnv = process.env) {}

  async getPassword(account: string): Promise<string | null> {
    const password = this.env.MAILWATCH_PASSWORD;
    if (!password) return null;
    const scoped = this.env.MAILWATCH_PASSWORD_ACCOUNT;
    if (scoped && scoped !== account) return null;
    return password;
  }
}

export class MemoryCredentialStore implements CredentialStore {
  private passwords = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [account, password] of Object.entries(initial)) {
      this.passwords.set(account, password);
    }
  }

  async getPassword(account: string): Promise<string | null> {
    return this.passwords.get(account) ?? null;
  }

  async setPassword(account: string, password: string): Promise<void> {
    this.passwords.set(account, password);
  }
}
