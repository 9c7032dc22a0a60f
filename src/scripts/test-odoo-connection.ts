#!/usr/bin/env node

/**
 * Checks that the Odoo server configured in .env answers.
 *
 * Usage:
 *   npm run odoo:check
 *   npm run odoo:check -- --limit 10
 */

import 'reflect-metadata';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import odooConfig, { OdooSettings } from '../config/odoo.config';
import { OdooConnectionPool } from '../odoo/odoo-connection.pool';
import { ODOO_SETTINGS, SALE_ORDER_MODEL } from '../odoo/odoo.constants';
import { OdooIntegrationError } from '../odoo/odoo.errors';
import { odooPoolProviders } from '../odoo/odoo.providers';

const SAMPLE_FIELDS = ['name', 'state', 'amount_total', 'date_order'];

interface SampleOrder {
  name: string;
  state: string;
  amount_total: number | false;
  date_order: string;
}

export type CheckPool = Pick<OdooConnectionPool, 'ping' | 'searchCount' | 'searchRead'>;

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env', load: [odooConfig] })],
  providers: odooPoolProviders,
})
class OdooCheckModule {}

/** Connection settings safe to print: no API key. */
export function describeSettings(settings: OdooSettings) {
  return {
    host: settings.host,
    port: settings.port,
    protocol: settings.protocol,
    database: settings.database,
    username: settings.username,
    version: settings.version ?? null,
  };
}

export async function runCheck(
  pool: CheckPool,
  settings: OdooSettings,
  limit: number,
  print: (line: string) => void,
): Promise<void> {
  print('Testing Odoo connection with the following settings:');
  print(JSON.stringify(describeSettings(settings), null, 2));

  const reachable = await pool.ping();
  print(reachable ? '\n✅ Odoo ping successful' : '\n⚠️ Odoo ping failed to respond');

  const count = await pool.searchCount(SALE_ORDER_MODEL);
  print(`Total sale.order records: ${count}`);

  const sample = await pool.searchRead<SampleOrder>(SALE_ORDER_MODEL, {
    domain: [['state', '!=', 'cancel']],
    fields: SAMPLE_FIELDS,
    limit,
    order: 'date_order desc',
  });
  print('\nSample sale.order rows:');
  print(
    JSON.stringify(
      sample.map((row) => ({
        name: row.name,
        state: row.state,
        amount_total: row.amount_total,
        date_order: row.date_order,
      })),
      null,
      2,
    ),
  );
}

async function main(): Promise<number> {
  const argv = yargs(hideBin(process.argv))
    .options({
      limit: {
        type: 'number',
        default: 5,
        describe: 'Number of sample sale orders to print',
      },
    })
    .example('$0', 'Ping Odoo and print five recent sale orders')
    .example('$0 --limit 20', 'Print twenty recent sale orders')
    .help()
    .parseSync();

  const app = await NestFactory.createApplicationContext(OdooCheckModule, { logger: ['error', 'warn'] });
  const pool = app.get(OdooConnectionPool);
  const settings = app.get<OdooSettings>(ODOO_SETTINGS);

  try {
    await runCheck(pool, settings, argv.limit, (line) => console.log(line));
    return 0;
  } catch (error) {
    if (error instanceof OdooIntegrationError) {
      console.error(`\n❌ Failed to communicate with Odoo: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
