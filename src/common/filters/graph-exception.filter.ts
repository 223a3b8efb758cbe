import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { GraphError, GraphErrorCode } from '../errors/graph-error';

export const STATUS_BY_CODE: Record<GraphErrorCode, HttpStatus> = {
  PermissionDenied: HttpStatus.FORBIDDEN,
  NotFound: HttpStatus.NOT_FOUND,
  GroupNotFound: HttpStatus.NOT_FOUND,
  ValidationFailed: HttpStatus.BAD_REQUEST,
  InvalidReference: HttpStatus.UNPROCESSABLE_ENTITY,
  AlreadyGrouped: HttpStatus.CONFLICT,
  CircularReference: HttpStatus.CONFLICT,
  DepthExceeded: HttpStatus.CONFLICT,
  StaleState: HttpStatus.CONFLICT,
  Conflict: HttpStatus.CONFLICT,
};

@Catch(GraphError)
export class GraphExceptionFilter implements ExceptionFilter<GraphError> {
  private readonly logger = new Logger(GraphExceptionFilter.name);

  catch(exception: GraphError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = STATUS_BY_CODE[exception.code];
    this.logger.debug(`${exception.code}: ${exception.message}`);
    response.status(status).json({
      statusCode: status,
      code: exception.code,
      message: exception.message,
    });
  }
}
