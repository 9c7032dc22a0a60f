import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { createHash, randomUUID, timingSafeEqual } from 'crypto';
import { Request } from 'express';
import { AuthSettings, DEFAULT_JWT_SECRET } from '../config/auth.config';
import { LoginResult, LogoutListener, SessionPayload } from './interfaces/session.interface';

/**
 * Password gate in front of the dashboard. A successful login yields a
 * signed session token; logging out revokes its session id until the
 * token would have expired anyway.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly settings: AuthSettings;
  private readonly revoked = new Map<string, number>();
  private readonly logoutListeners: LogoutListener[] = [];

  constructor(
    configService: ConfigService,
    private readonly jwtService: JwtService,
  ) {
    this.settings = configService.getOrThrow<AuthSettings>('auth');

    if (!this.settings.password) {
      this.logger.warn('DASHBOARD_PASSWORD is not set; every login attempt will be rejected');
    }
    if (this.settings.jwtSecret === DEFAULT_JWT_SECRET) {
      this.logger.warn('JWT_SECRET is using the default value; set it before exposing the dashboard');
    }
  }

  get cookieName(): string {
    return this.settings.cookieName;
  }

  get sessionTtlSeconds(): number {
    return this.settings.sessionTtlSeconds;
  }

  get cookieSecure(): boolean {
    return this.settings.cookieSecure;
  }

  verifyPassword(candidate: string): boolean {
    if (!this.settings.password) {
      return false;
    }
    return timingSafeEqual(digest(candidate), digest(this.settings.password));
  }

  async login(password: string): Promise<LoginResult> {
    if (!this.verifyPassword(password)) {
      this.logger.warn('Rejected dashboard login attempt');
      throw new UnauthorizedException('Invalid password');
    }

    const sessionId = randomUUID();
    const accessToken = await this.jwtService.signAsync({ sid: sessionId });
    this.logger.log(`Session ${sessionId} signed in`);

    return { accessToken, expiresIn: this.settings.sessionTtlSeconds, sessionId };
  }

  logout(sessionId: string): void {
    this.revoked.set(sessionId, Date.now() + this.settings.sessionTtlSeconds * 1000);
    for (const listener of this.logoutListeners) {
      listener(sessionId);
    }
    this.logger.log(`Session ${sessionId} signed out`);
  }

  onLogout(listener: LogoutListener): void {
    this.logoutListeners.push(listener);
  }

  async verifySession(token: string): Promise<SessionPayload | null> {
    let payload: SessionPayload;
    try {
      payload = await this.jwtService.verifyAsync<SessionPayload>(token);
    } catch {
      return null;
    }

    if (typeof payload.sid !== 'string' || this.isRevoked(payload.sid)) {
      return null;
    }
    return payload;
  }

  /** Bearer header first, then the session cookie. */
  extractToken(request: Pick<Request, 'headers' | 'cookies'>): string | undefined {
    const [type, token] = request.headers.authorization?.split(' ') ?? [];
    if (type === 'Bearer' && token) {
      return token;
    }

    const cookies: Record<string, unknown> | undefined = request.cookies;
    const cookie = cookies?.[this.settings.cookieName];
    return typeof cookie === 'string' && cookie !== '' ? cookie : undefined;
  }

  async resolveSession(request: Request): Promise<SessionPayload | null> {
    const token = this.extractToken(request);
    return token ? this.verifySession(token) : null;
  }

  private isRevoked(sessionId: string): boolean {
    const now = Date.now();
    for (const [id, expiresAt] of this.revoked) {
      if (expiresAt <= now) {
        this.revoked.delete(id);
      }
    }
    return this.revoked.has(sessionId);
  }
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}
