import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { OdooIntegrationError } from '../../odoo/odoo.errors';

/** ERP outages surface as 503 instead of a generic 500. */
@Catch(OdooIntegrationError)
export class OdooExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(OdooExceptionFilter.name);

  catch(exception: OdooIntegrationError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    this.logger.warn(`Odoo unavailable: ${exception.message}`);

    response.status(HttpStatus.SERVICE_UNAVAILABLE).json({
      statusCode: HttpStatus.SERVICE_UNAVAILABLE,
      error: 'Odoo Unavailable',
      message: exception.message,
    });
  }
}
