import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { ConfigurationError, describeError } from './errors';

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(
    private readonly httpAdapterHost: HttpAdapterHost,
    private readonly exposeStack = process.env.NODE_ENV !== 'production',
  ) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : exception instanceof ConfigurationError
          ? 400
          : 500;
    if (status >= 500) {
      this.logger.error(
        describeError(exception),
        exception instanceof Error ? exception.stack : undefined,
      );
    }
    httpAdapter.reply(
      ctx.getResponse(),
      {
        statusCode: status,
        message: describeError(exception),
        issues:
          exception instanceof ConfigurationError ? exception.issues : undefined,
        stack:
          this.exposeStack && exception instanceof Error
            ? exception.stack
            : undefined,
      },
      status,
    );
  }
}
