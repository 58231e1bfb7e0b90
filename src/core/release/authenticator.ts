import type { ContainerEngine } from './engine'
import type { RetryExecutor } from './retry'
import type { Credentials } from '../../types/release'

/** Registry session for one run: login before the first build, logout after the last push. */
export class Authenticator {
  private loggedIn = false

  constructor(
    private readonly engine: ContainerEngine,
    private readonly retry: RetryExecutor,
    private readonly server?: string
  ) {}

  get active(): boolean { return this.loggedIn }

  async login(credentials: Credentials): Promise<void> {
    await this.retry.execute('login', () => this.engine.login(credentials, this.server))
    this.loggedIn = true
  }

  async logout(): Promise<void> {
    await this.retry.execute('logout', () => this.engine.logout(this.server))
    this.loggedIn = false
  }
}
