import { Injectable, BadRequestException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Express } from 'express';
import 'multer';
import sharp from 'sharp';
import { mkdir, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { FileMessage } from '../libs/enums';
import { GARMENT_MAX_DIMENSION } from '../libs/config';
import { UploadConfig } from '../config/upload.config';

export interface StoredImage {
	filename: string;
	mimetype: string;
	path: string;
	url: string;
}

export function extensionForMimeType(mimeType: string): string {
	return mimeType === 'image/png' ? '.png' : mimeType === 'image/webp' ? '.webp' : '.jpg';
}

@Injectable()
export class FilesService {
	private readonly logger = new Logger(FilesService.name);

	constructor(private configService: ConfigService) {}

	/** Describe a file multer already wrote to the upload directory */
	storeImage(file: Express.Multer.File | undefined): StoredImage {
		if (!file) {
			throw new BadRequestException(FileMessage.FILE_NOT_FOUND);
		}

		return {
			filename: file.filename,
			mimetype: file.mimetype,
			path: file.path,
			url: this.buildUrl(file.filename),
		};
	}

	async storeBase64Image(base64Data: string, mimeType: string = 'image/jpeg'): Promise<StoredImage> {
		if (!base64Data) {
			throw new BadRequestException(FileMessage.FILE_NOT_FOUND);
		}

		// Remove data URL prefix if present (e.g., "data:image/jpeg;base64,")
		const base64String = base64Data.includes(',') ? base64Data.split(',')[1] : base64Data;
		const buffer = Buffer.from(base64String, 'base64');

		return this.writeImage(buffer, mimeType);
	}

	/**
	 * Prepare a product photo for compositing: flatten transparency onto white,
	 * shrink to fit 768x768 (never enlarge) and save as PNG.
	 */
	async preprocessGarment(sourcePath: string): Promise<StoredImage> {
		const buffer = await sharp(sourcePath)
			.rotate()
			.flatten({ background: '#ffffff' })
			.resize(GARMENT_MAX_DIMENSION, GARMENT_MAX_DIMENSION, { fit: 'inside', withoutEnlargement: true })
			.png()
			.toBuffer();

		this.logger.log(`🧼 Garment preprocessed: ${path.basename(sourcePath)} (${(buffer.length / 1024).toFixed(1)} KB)`);
		return this.writeImage(buffer, 'image/png');
	}

	/** Map a URL built by this service back to the stored file */
	resolveLocalPath(url: string): string {
		const { baseUrl, localPath } = this.getUploadConfig();
		let relative = url;
		if (baseUrl && relative.startsWith(baseUrl)) {
			relative = relative.slice(baseUrl.replace(/\/$/, '').length);
		}

		const prefix = `/${localPath}/`;
		const filename = relative.startsWith(prefix) ? relative.slice(prefix.length) : '';
		if (!filename || filename !== path.basename(filename)) {
			throw new BadRequestException(FileMessage.FILE_NOT_FOUND);
		}
		return path.join(this.uploadDirectory(), filename);
	}

	/**
	 * Delete stored files. Missing files are ignored and failures are logged,
	 * so the returned promise never rejects.
	 */
	async removeImages(filePaths: Iterable<string>): Promise<number> {
		const targets = [...new Set(filePaths)];
		const results = await Promise.allSettled(targets.map((filePath) => rm(filePath, { force: true })));

		let removed = 0;
		results.forEach((result, i) => {
			if (result.status === 'fulfilled') {
				removed++;
			} else {
				const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
				this.logger.warn(`⚠️ Could not remove ${path.basename(targets[i])}: ${reason}`);
			}
		});

		return removed;
	}

	uploadDirectory(): string {
		return path.join(process.cwd(), this.getUploadConfig().localPath);
	}

	private async writeImage(buffer: Buffer, mimeType: string): Promise<StoredImage> {
		const filename = `${randomUUID()}${extensionForMimeType(mimeType)}`;
		const directory = this.uploadDirectory();

		await mkdir(directory, { recursive: true });
		const filePath = path.join(directory, filename);
		await writeFile(filePath, buffer);

		return {
			filename,
			mimetype: mimeType,
			path: filePath,
			url: this.buildUrl(filename),
		};
	}

	private buildUrl(filename: string): string {
		const { baseUrl, localPath } = this.getUploadConfig();
		return baseUrl
			? `${baseUrl.replace(/\/$/, '')}/${localPath}/${filename}`
			: `/${localPath}/${filename}`;
	}

	private getUploadConfig(): UploadConfig {
		const uploadConfig = this.configService.get<UploadConfig>('upload');
		if (!uploadConfig || uploadConfig.provider !== 'local') {
			throw new BadRequestException(FileMessage.FILE_UPLOAD_FAILED);
		}
		return uploadConfig;
	}
}
