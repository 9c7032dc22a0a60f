import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthService } from '../auth/auth.service';
import { SessionStore } from '../auth/session-store';
import { AppSettings } from '../config/app.config';
import { PosFilterState } from './interfaces/dashboard.interface';
import { defaultFilterState } from './utils/dashboard-format.util';

/** POS filter per session; expires with the session and on logout. */
@Injectable()
export class DashboardFilterStore {
  private readonly states: SessionStore<PosFilterState>;
  readonly timeZone: string;

  constructor(configService: ConfigService, authService: AuthService) {
    this.timeZone = configService.getOrThrow<AppSettings>('app').timezone;
    this.states = new SessionStore(authService);
  }

  get size(): number {
    return this.states.size;
  }

  get(sessionId: string): PosFilterState {
    let state = this.states.get(sessionId);
    if (!state) {
      state = defaultFilterState(this.timeZone);
      this.states.set(sessionId, state);
    }
    return state;
  }

  set(sessionId: string, state: PosFilterState): void {
    this.states.set(sessionId, { ...state });
  }
}
