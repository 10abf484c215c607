import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
	private readonly logger = new Logger('HTTP');

	intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
		if (context.getType() !== 'http') {
			return next.handle();
		}

		const request = context.switchToHttp().getRequest<Request>();
		const response = context.switchToHttp().getResponse<Response>();
		const startTime = Date.now();

		return next.handle().pipe(
			tap({
				next: () => {
					this.logger.log(`${request.method} ${request.originalUrl} ${response.statusCode} - ${Date.now() - startTime}ms`);
				},
				error: (error: unknown) => {
					const message = error instanceof Error ? error.message : String(error);
					this.logger.warn(`${request.method} ${request.originalUrl} failed after ${Date.now() - startTime}ms: ${message}`);
				},
			}),
		);
	}
}
