import { BadRequestException, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { diskStorage } from 'multer';
import { mkdirSync } from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { ALLOWED_IMAGE_MIME_TYPES, FILE_SIZE_LIMIT } from '../libs/config';
import { FileMessage } from '../libs/enums';
import { UploadConfig } from '../config/upload.config';
import { FilesService, extensionForMimeType } from './files.service';

@Module({
	imports: [
		MulterModule.registerAsync({
			imports: [ConfigModule],
			inject: [ConfigService],
			useFactory: (configService: ConfigService) => {
				const localPath = configService.get<UploadConfig>('upload')?.localPath ?? 'uploads';
				const destination = path.join(process.cwd(), localPath);
				mkdirSync(destination, { recursive: true });

				return {
					storage: diskStorage({
						destination,
						filename: (_req, file, callback) => {
							callback(null, `${randomUUID()}${extensionForMimeType(file.mimetype)}`);
						},
					}),
					limits: FILE_SIZE_LIMIT,
					fileFilter: (_req, file, callback) => {
						if (ALLOWED_IMAGE_MIME_TYPES.includes(file.mimetype)) {
							callback(null, true);
						} else {
							callback(new BadRequestException(FileMessage.FILE_TYPE_NOT_ALLOWED), false);
						}
					},
				};
			},
		}),
	],
	providers: [FilesService],
	exports: [FilesService, MulterModule],
})
export class FilesModule {}
