import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { DomainError } from '../errors/domain.error';
import { AppRequest } from '../types/request.types';

export interface ErrorBody {
  error: string;
  message: string;
}

const messageOf = (payload: string | object): string | undefined => {
  if (typeof payload === 'string') return payload;
  if ('message' in payload) {
    const { message } = payload;
    if (Array.isArray(message)) return message.join('; ');
    if (typeof message === 'string') return message;
  }
  return undefined;
};

const codeForStatus = (status: number): string => {
  if (status === HttpStatus.BAD_REQUEST) return 'validation_failed';
  if (status === HttpStatus.UNAUTHORIZED) return 'unauthorized';
  const name = HttpStatus[status];
  return typeof name === 'string' ? name.toLowerCase() : 'error';
};

@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<AppRequest>();

    const { status, body } = this.toErrorResponse(exception, req);
    res.status(status).json(body);
  }

  toErrorResponse(exception: unknown, req?: AppRequest): { status: number; body: ErrorBody } {
    if (exception instanceof DomainError) {
      if (exception.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(
          `[${req?.requestId ?? '-'}] ${req?.method ?? ''} ${req?.url ?? ''}: ${exception.message}`,
          exception.stack,
        );
        return {
          status: exception.status,
          body: { error: exception.code, message: 'An unexpected error occurred' },
        };
      }
      return {
        status: exception.status,
        body: { error: exception.code, message: exception.message },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        body: {
          error: codeForStatus(status),
          message: messageOf(exception.getResponse()) ?? exception.message,
        },
      };
    }

    const detail = exception instanceof Error ? exception.stack ?? exception.message : String(exception);
    this.logger.error(
      `[${req?.requestId ?? '-'}] Unhandled error on ${req?.method ?? ''} ${req?.url ?? ''}`,
      detail,
    );
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { error: 'internal_error', message: 'An unexpected error occurred' },
    };
  }
}
