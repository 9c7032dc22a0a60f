import { Request } from 'express';

export interface SessionPayload {
  sid: string;
  iat?: number;
  exp?: number;
}

export interface SessionRequest extends Request {
  sessionId?: string;
}

export interface LoginResult {
  accessToken: string;
  expiresIn: number;
  sessionId: string;
}

export type LogoutListener = (sessionId: string) => void;
