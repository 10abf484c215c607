import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggingInterceptor } from './libs/interceptor/Logging.interceptor';
import { HttpExceptionFilter } from './common/filters';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { NestExpressApplication } from '@nestjs/platform-express';
import { UploadConfig } from './config/upload.config';

async function bootstrap() {
	const logger = new Logger('Bootstrap');

	try {
		const app = await NestFactory.create<NestExpressApplication>(AppModule, {
			logger: ['error', 'warn', 'log', 'debug', 'verbose'],
			bodyParser: false, // Custom limits below
		});

		// Body parser limits (50MB safe buffer for 30MB uploads)
		app.useBodyParser('json', { limit: '50mb' });
		app.useBodyParser('urlencoded', { limit: '50mb', extended: true });

		// Global exception filter
		app.useGlobalFilters(new HttpExceptionFilter());

		app.useGlobalPipes(
			new ValidationPipe({
				whitelist: true, // Remove unknown properties
				forbidNonWhitelisted: true, // Throw error if unknown properties exist
				transform: true, // Transform payloads to DTO instances
				transformOptions: {
					enableImplicitConversion: true, // Multipart fields arrive as strings
				},
				validationError: {
					target: false,
					value: false,
				},
			}),
		);

		// Global logging interceptor
		app.useGlobalInterceptors(new LoggingInterceptor());

		// API prefix
		app.setGlobalPrefix('api');

		const configService = app.get(ConfigService);
		const frontendUrl = configService.get<string>('app.frontendUrl');

		app.enableCors({
			origin: (origin, callback) => {
				// Allow requests with no origin (curl, server-to-server)
				if (!origin) return callback(null, true);

				const allowedOrigins = [frontendUrl, 'http://localhost:3000', 'http://localhost:3001'].filter(Boolean);
				if (allowedOrigins.includes(origin)) {
					callback(null, true);
				} else {
					logger.warn(`CORS blocked origin: ${origin}`);
					callback(null, false);
				}
			},
			credentials: true,
			methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS', 'HEAD'],
			allowedHeaders: ['Content-Type', 'Accept', 'Cache-Control', 'X-Requested-With'],
			exposedHeaders: ['Content-Length', 'Content-Type'],
		});

		// Generated previews and try-on results are downloaded from here
		const uploadConfig = configService.get<UploadConfig>('upload');
		if (uploadConfig?.localPath) {
			const uploadsPath = join(process.cwd(), uploadConfig.localPath);
			if (!existsSync(uploadsPath)) {
				mkdirSync(uploadsPath, { recursive: true });
			}

			// Served without the /api prefix
			app.useStaticAssets(uploadsPath, {
				prefix: `/${uploadConfig.localPath}/`,
			});

			logger.log(`📁 Serving static files from: ${uploadsPath} at /${uploadConfig.localPath}/`);
		}

		const swaggerConfig = new DocumentBuilder()
			.setTitle('Try-On Studio API')
			.setDescription('Product tagging, model preview generation and virtual try-on')
			.setVersion('1.0')
			.build();
		SwaggerModule.setup('api/docs', app, SwaggerModule.createDocument(app, swaggerConfig));

		const port = configService.get<number>('app.port') || 3000;
		const host = process.env.LISTEN_HOST || '0.0.0.0';

		await app.listen(port, host);

		logger.log(`🚀 Application is running on: http://${host}:${port}`);
		logger.log(`📝 API endpoints available at: http://localhost:${port}/api`);
		logger.log(`📚 API docs at: http://localhost:${port}/api/docs`);
	} catch (error) {
		logger.error('Failed to start application', error instanceof Error ? error.stack : String(error));
		process.exit(1);
	}
}

void bootstrap();
