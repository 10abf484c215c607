import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';

export interface ErrorResponseBody {
	success: false;
	statusCode: number;
	message: string | string[];
	error: string;
	path: string;
	timestamp: string;
}

/**
 * Renders every error as `{ success: false, statusCode, message, error, path, timestamp }`.
 * Non-HTTP errors become a 500 and are logged with their stack.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const ctx = host.switchToHttp();
		const response = ctx.getResponse<Response>();
		const request = ctx.getRequest<Request>();

		const body = buildErrorBody(exception, request.url);

		if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
			const stack = exception instanceof Error ? exception.stack : undefined;
			this.logger.error(`${request.method} ${request.url} ${body.statusCode}: ${String(body.message)}`, stack);
		} else {
			this.logger.warn(`${request.method} ${request.url} ${body.statusCode}: ${String(body.message)}`);
		}

		response.status(body.statusCode).json(body);
	}
}

export function buildErrorBody(exception: unknown, path: string, now: Date = new Date()): ErrorResponseBody {
	if (!(exception instanceof HttpException)) {
		return {
			success: false,
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			message: 'Internal server error',
			error: 'Internal Server Error',
			path,
			timestamp: now.toISOString(),
		};
	}

	const statusCode = exception.getStatus();
	const payload = exception.getResponse();
	let message: string | string[] = exception.message;
	let error = exception.name;

	if (typeof payload === 'string') {
		message = payload;
	} else if (typeof payload === 'object' && payload !== null) {
		if ('message' in payload && (typeof payload.message === 'string' || Array.isArray(payload.message))) {
			message = payload.message;
		}
		if ('error' in payload && typeof payload.error === 'string') {
			error = payload.error;
		}
	}

	return { success: false, statusCode, message, error, path, timestamp: now.toISOString() };
}
