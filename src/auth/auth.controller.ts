import { Body, Controller, Get, HttpCode, HttpStatus, Post, Res } from '@nestjs/common';
import { Response } from 'express';
import { AuthService } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { Public } from './decorators/public.decorator';
import { SessionId } from './decorators/session-id.decorator';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto, @Res({ passthrough: true }) res: Response) {
    const result = await this.authService.login(dto.password);
    setSessionCookie(res, this.authService, result.accessToken);

    return {
      accessToken: result.accessToken,
      expiresIn: result.expiresIn,
    };
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  logout(@SessionId() sessionId: string, @Res({ passthrough: true }) res: Response) {
    this.authService.logout(sessionId);
    clearSessionCookie(res, this.authService);
    return { ok: true };
  }

  @Get('session')
  getSession(@SessionId() sessionId: string) {
    return { authenticated: true, sessionId };
  }
}

export function setSessionCookie(res: Response, authService: AuthService, token: string): void {
  res.cookie(authService.cookieName, token, {
    httpOnly: true,
    secure: authService.cookieSecure,
    sameSite: 'lax',
    path: '/',
    maxAge: authService.sessionTtlSeconds * 1000,
  });
}

export function clearSessionCookie(res: Response, authService: AuthService): void {
  res.clearCookie(authService.cookieName, { path: '/' });
}
