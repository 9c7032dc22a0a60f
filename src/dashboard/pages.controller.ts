import { Body, Controller, Get, HttpStatus, Post, Query, Req, Res, UnauthorizedException } from '@nestjs/common';
import { Request, Response } from 'express';
import { clearSessionCookie, setSessionCookie } from '../auth/auth.controller';
import { AuthService } from '../auth/auth.service';
import { Public } from '../auth/decorators/public.decorator';
import { SessionId } from '../auth/decorators/session-id.decorator';
import { LoginDto } from '../auth/dto/login.dto';
import { TemplateRenderer } from '../common/templates/template.renderer';
import { DashboardService } from './dashboard.service';
import { DashboardFilterDto } from './dto/dashboard-filter.dto';

/** Server-rendered login and dashboard pages backed by HTML forms. */
@Controller()
export class PagesController {
  constructor(
    private readonly authService: AuthService,
    private readonly dashboardService: DashboardService,
    private readonly renderer: TemplateRenderer,
  ) {}

  @Public()
  @Get()
  async index(@Req() req: Request, @Res() res: Response, @Query('refreshed') refreshed?: string) {
    const session = await this.authService.resolveSession(req);
    if (!session) {
      res.type('html').send(this.renderer.render('login', {}));
      return;
    }

    const view = await this.dashboardService.buildView(session.sid);
    res.type('html').send(
      this.renderer.render('dashboard', { ...view, notice: refreshed ? 'Dashboard data refreshed' : null }),
    );
  }

  @Public()
  @Get('login')
  loginPage(@Res() res: Response) {
    res.type('html').send(this.renderer.render('login', {}));
  }

  @Public()
  @Post('login')
  async login(@Body() dto: LoginDto, @Res() res: Response) {
    try {
      const result = await this.authService.login(dto.password);
      setSessionCookie(res, this.authService, result.accessToken);
      res.redirect(HttpStatus.SEE_OTHER, '/');
    } catch (error) {
      if (!(error instanceof UnauthorizedException)) {
        throw error;
      }
      res.status(HttpStatus.UNAUTHORIZED).type('html').send(this.renderer.render('login', { error: error.message }));
    }
  }

  @Post('logout')
  logout(@SessionId() sessionId: string, @Res() res: Response) {
    this.authService.logout(sessionId);
    clearSessionCookie(res, this.authService);
    res.redirect(HttpStatus.SEE_OTHER, '/login');
  }

  @Post('filter')
  applyFilter(@SessionId() sessionId: string, @Body() dto: DashboardFilterDto, @Res() res: Response) {
    this.dashboardService.setFilter(sessionId, dto);
    res.redirect(HttpStatus.SEE_OTHER, '/');
  }

  @Post('refresh')
  async refresh(@Res() res: Response) {
    await this.dashboardService.refresh();
    res.redirect(HttpStatus.SEE_OTHER, '/?refreshed=1');
  }
}
