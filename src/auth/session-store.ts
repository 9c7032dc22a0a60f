import { AuthService } from './auth.service';

interface Entry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Per-session values held in memory. An entry lives for one session
 * lifetime after its last write and is dropped when the session logs out.
 */
export class SessionStore<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly ttlMs: number;

  constructor(
    authService: Pick<AuthService, 'onLogout' | 'sessionTtlSeconds'>,
    private readonly now: () => number = () => Date.now(),
  ) {
    this.ttlMs = authService.sessionTtlSeconds * 1000;
    authService.onLogout((sessionId) => this.delete(sessionId));
  }

  get size(): number {
    this.sweep();
    return this.entries.size;
  }

  get(sessionId: string): T | undefined {
    this.sweep();
    return this.entries.get(sessionId)?.value;
  }

  set(sessionId: string, value: T): void {
    this.sweep();
    this.entries.set(sessionId, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(sessionId: string): boolean {
    return this.entries.delete(sessionId);
  }

  private sweep(): void {
    const now = this.now();
    for (const [sessionId, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(sessionId);
      }
    }
  }
}
