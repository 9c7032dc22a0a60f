import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { AuthService } from '../auth/auth.service';
import { SessionStore } from '../auth/session-store';
import { TemplatesModule } from '../common/templates/templates.module';
import { ReconcileResult } from './interfaces/stock-control.interface';
import { STOCK_RESULTS } from './stock-control.constants';
import { StockControlController } from './stock-control.controller';
import { StockControlService } from './stock-control.service';
import { StockPageController } from './stock-page.controller';

@Module({
  imports: [AuthModule, TemplatesModule],
  controllers: [StockControlController, StockPageController],
  providers: [
    StockControlService,
    {
      provide: STOCK_RESULTS,
      inject: [AuthService],
      useFactory: (authService: AuthService) => new SessionStore<ReconcileResult>(authService),
    },
  ],
})
export class StockControlModule {}
