import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OdooSettings } from '../config/odoo.config';
import { OdooConnectionPool } from './odoo-connection.pool';
import { createOdooConnectionFactory } from './odoo-rpc.client';
import { ODOO_CONNECTION_FACTORY, ODOO_SETTINGS } from './odoo.constants';

/** Settings, connection factory and pool, resolved from the `odoo` config namespace. */
export const odooPoolProviders: Provider[] = [
  {
    provide: ODOO_SETTINGS,
    inject: [ConfigService],
    useFactory: (configService: ConfigService) => configService.getOrThrow<OdooSettings>('odoo'),
  },
  {
    provide: ODOO_CONNECTION_FACTORY,
    inject: [ODOO_SETTINGS],
    useFactory: (settings: OdooSettings) => createOdooConnectionFactory(settings),
  },
  OdooConnectionPool,
];
