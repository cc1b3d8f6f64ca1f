import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Response } from 'express';
import { DecryptoError } from './decrypto-error';

@Catch(DecryptoError)
export class DecryptoErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(DecryptoErrorFilter.name);

  catch(exception: DecryptoError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    if (exception.httpStatusCode >= 500) {
      this.logger.error(
        `${exception.code}: ${exception.message}`,
        exception.originalError?.stack ?? exception.stack,
      );
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    if (exception.httpStatusCode === 401) {
      response.setHeader('WWW-Authenticate', 'Bearer');
    }

    response.status(exception.httpStatusCode).json(exception.toJSON());
  }
}
