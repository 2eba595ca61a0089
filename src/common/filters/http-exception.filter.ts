import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { ConsensusEngineError } from "@/common/errors/consensus-engine.errors";
import {
  ErrorCode,
  ErrorSeverity,
  createError,
  createHttpErrorResponse,
  type HttpErrorResponse,
  type IErrorDetails,
} from "@/common/types/error-handling";

const STATUS_BY_CODE: Record<ErrorCode, HttpStatus> = {
  [ErrorCode.UNKNOWN_ERROR]: HttpStatus.INTERNAL_SERVER_ERROR,
  [ErrorCode.VALIDATION_ERROR]: HttpStatus.BAD_REQUEST,
  [ErrorCode.CONFIGURATION_ERROR]: HttpStatus.BAD_REQUEST,
  [ErrorCode.INVALID_REPORTER_ID]: HttpStatus.BAD_REQUEST,
  [ErrorCode.REPORTER_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ErrorCode.REPORTER_ALREADY_REGISTERED]: HttpStatus.CONFLICT,
  [ErrorCode.INVALID_AMOUNT]: HttpStatus.BAD_REQUEST,
  [ErrorCode.STAKE_BELOW_MINIMUM]: HttpStatus.CONFLICT,
  [ErrorCode.INVALID_STATUS_TRANSITION]: HttpStatus.CONFLICT,
  [ErrorCode.FEED_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ErrorCode.FEED_ALREADY_REGISTERED]: HttpStatus.CONFLICT,
  [ErrorCode.ROUND_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ErrorCode.ILLEGAL_ROUND_TRANSITION]: HttpStatus.INTERNAL_SERVER_ERROR,
  [ErrorCode.FEED_STATE_CORRUPTION]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorCode.WRITER_CONFLICT]: HttpStatus.CONFLICT,
  [ErrorCode.MALFORMED_SUBMISSION]: HttpStatus.BAD_REQUEST,
};

function extractHttpMessage(body: string | object): string {
  if (typeof body === "string") {
    return body;
  }
  if ("message" in body) {
    const message = body.message;
    if (Array.isArray(message)) return message.map(String).join("; ");
    if (typeof message === "string") return message;
  }
  return "Request failed";
}

/**
 * Global exception filter. Engine errors map to a status by their code; everything else becomes a
 * StandardErrorResponse with the status Nest already assigned, or 500.
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  static statusFor(code: ErrorCode): HttpStatus {
    return STATUS_BY_CODE[code];
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const requestId = this.extractRequestId(request);

    const { status, details } = this.toErrorDetails(exception);
    const body: HttpErrorResponse = createHttpErrorResponse(status, details, requestId, request.url, request.method);

    response.setHeader("X-Content-Type-Options", "nosniff");
    response.setHeader("X-Request-Id", requestId);

    this.logError(exception, body);
    response.status(status).json(body);
  }

  private toErrorDetails(exception: unknown): { status: HttpStatus; details: IErrorDetails } {
    if (exception instanceof ConsensusEngineError) {
      return {
        status: HttpExceptionFilter.statusFor(exception.code),
        details: exception.toErrorDetails(exception.name),
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const code = status === HttpStatus.BAD_REQUEST ? ErrorCode.VALIDATION_ERROR : `HTTP_${status}`;
      return {
        status,
        details: createError(code, extractHttpMessage(exception.getResponse()), this.severityFor(status)),
      };
    }

    const message = exception instanceof Error ? exception.message : String(exception);
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      details: createError(ErrorCode.UNKNOWN_ERROR, message, ErrorSeverity.HIGH),
    };
  }

  private severityFor(status: number): ErrorSeverity {
    if (status >= 500) return ErrorSeverity.HIGH;
    if (status === 404) return ErrorSeverity.LOW;
    return ErrorSeverity.MEDIUM;
  }

  private extractRequestId(request: Request): string {
    const header = request.headers["x-request-id"];
    if (typeof header === "string" && header.length > 0) {
      return header;
    }
    return uuidv4();
  }

  private logError(exception: unknown, body: HttpErrorResponse): void {
    const message = `${body.method} ${body.path} -> ${body.statusCode} ${body.error.code}: ${body.error.message}`;
    const logContext = { requestId: body.requestId, severity: body.error.severity };

    if (body.statusCode >= 500) {
      this.logger.error(message, exception instanceof Error ? exception.stack : undefined, logContext);
    } else if (body.statusCode >= 400 && body.statusCode !== 404) {
      this.logger.warn(message, logContext);
    } else {
      this.logger.debug(message, logContext);
    }
  }
}
