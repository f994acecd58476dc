import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from "@nestjs/common";
import type { Response } from "express";

import { ConfigurationError, ProviderError, UnsupportedMediaError } from "../errors.js";

type DomainError = UnsupportedMediaError | ProviderError | ConfigurationError;

export function statusForError(error: DomainError): HttpStatus {
  if (error instanceof UnsupportedMediaError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (error instanceof ProviderError) {
    return HttpStatus.BAD_GATEWAY;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

@Catch(UnsupportedMediaError, ProviderError, ConfigurationError)
export class DomainErrorFilter implements ExceptionFilter<DomainError> {
  private readonly logger = new Logger(DomainErrorFilter.name);

  catch(error: DomainError, host: ArgumentsHost): void {
    const status = statusForError(error);
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${error.name}: ${error.message}`);
    }
    host.switchToHttp().getResponse<Response>().status(status).json({
      statusCode: status,
      error: error.name,
      message: error.message,
    });
  }
}
