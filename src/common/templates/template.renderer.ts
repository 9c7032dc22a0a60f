import { Injectable, Logger } from '@nestjs/common';
import * as Handlebars from 'handlebars';
import { readFileSync } from 'fs';
import { join } from 'path';
import { formatRupiah } from '../../dashboard/utils/dashboard-format.util';

export type TemplateName = 'login' | 'dashboard' | 'stock-control' | 'sales-report';

@Injectable()
export class TemplateRenderer {
  private readonly logger = new Logger(TemplateRenderer.name);
  private readonly handlebars = Handlebars.create();
  private readonly compiled = new Map<TemplateName, Handlebars.TemplateDelegate>();
  private readonly templatesPath = join(__dirname, '..', '..', '..', 'templates');

  constructor() {
    this.handlebars.registerHelper('rupiah', (value: unknown) => formatRupiah(Number(value) || 0));
    this.handlebars.registerHelper('eq', (left: unknown, right: unknown) => left === right);
    this.handlebars.registerHelper('percent', (value: unknown) => `${(Number(value) || 0).toFixed(1)}%`);
  }

  render(name: TemplateName, context: object): string {
    return this.template(name)(context);
  }

  private template(name: TemplateName): Handlebars.TemplateDelegate {
    const cached = this.compiled.get(name);
    if (cached) {
      return cached;
    }

    const path = join(this.templatesPath, `${name}.hbs`);
    const template = this.handlebars.compile(readFileSync(path, 'utf8'));
    this.compiled.set(name, template);
    this.logger.debug(`Compiled template ${path}`);
    return template;
  }
}
