import { Injectable, InternalServerErrorException, Logger, BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
	GoogleGenAI,
	HarmCategory,
	HarmBlockThreshold,
	GenerateContentResponse,
	Part,
	SafetySetting,
} from '@google/genai';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { AIMessage, FileMessage, GarmentCategory } from '../libs/enums';
import { GEMINI_ANALYSIS_MODEL, GEMINI_MODEL, VALID_IMAGE_SIZES, GeminiImageResult } from '../libs/config';
import { PromptPair } from '../common/interfaces/garment.interface';
import { ServiceResult, failure, success } from '../libs/types/result/result.type';
import { CATEGORY_CLASSIFICATION_PROMPT } from './prompts/category-classification.prompt';
import { buildTryOnPrompt } from './prompts/tryon-composite.prompt';

// Custom error types for better error handling
export class GeminiTimeoutError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'GeminiTimeoutError';
	}
}

export class GeminiGenerationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'GeminiGenerationError';
	}
}

export interface TryOnInput {
	personImage: string;
	garmentImage: string;
	garmentDescription: string;
	category: GarmentCategory;
}

const SAFETY_SETTINGS: SafetySetting[] = [
	{ category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_NONE },
	{ category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_NONE },
	{ category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_NONE },
	{ category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_NONE },
];

const REFUSAL_MARKERS = ['cannot generate', 'unable to generate', 'i cannot', 'i am unable', 'violates', 'policy'];

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class GeminiService {
	private client: GoogleGenAI | null = null;
	private readonly logger = new Logger(GeminiService.name);

	private readonly MODEL = GEMINI_MODEL;
	private readonly ANALYSIS_MODEL = GEMINI_ANALYSIS_MODEL;

	// ⏱️ Image generation can take a while
	private readonly TIMEOUT_MS = 180 * 1000;
	private readonly MAX_RETRIES = 2;
	private readonly RETRY_DELAY_MS = 3000;

	/** DTO aspect_ratio -> Gemini imageConfig */
	private static readonly ASPECT_RATIO_MAP: Record<string, string> = {
		'1:1': '1:1',
		'9:16': '9:16',
		'4:5': '4:5',
		'16:9': '16:9',
		'3:4': '3:4',
		'4:3': '4:3',
		'2:3': '2:3',
		'3:2': '3:2',
		'21:9': '21:9',
	};

	constructor(private readonly configService: ConfigService) { }

	private mapAspectRatioToGemini(dtoRatio?: string): string {
		if (!dtoRatio) return '3:4';
		return GeminiService.ASPECT_RATIO_MAP[dtoRatio.trim()] ?? '3:4';
	}

	private mapResolutionToGemini(resolution?: string): string {
		if (!resolution) return '1K';
		const upper = resolution.trim().toUpperCase();
		return VALID_IMAGE_SIZES.find((size) => size === upper) ?? '1K';
	}

	/**
	 * Promise with timeout wrapper
	 */
	private withTimeout<T>(promise: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
		return new Promise((resolve, reject) => {
			const timeoutId = setTimeout(() => {
				reject(new GeminiTimeoutError(`⏱️ ${operationName} timed out after ${timeoutMs / 1000} seconds`));
			}, timeoutMs);

			promise
				.then((result) => {
					clearTimeout(timeoutId);
					resolve(result);
				})
				.catch((error: unknown) => {
					clearTimeout(timeoutId);
					reject(error);
				});
		});
	}

	/**
	 * Generate one model preview from a prompt pair.
	 * The image API has no negative prompt, so the negative text becomes an "Avoid" line.
	 */
	async generateImage(pair: PromptPair, aspectRatio?: string, resolution?: string): Promise<GeminiImageResult> {
		if (!pair.positive) {
			throw new GeminiGenerationError('Prompt string is required');
		}

		const prompt = `${pair.positive}.\nAvoid: ${pair.negative}.`;
		return this.withRetry('Gemini image generation', () =>
			this.requestImage([{ text: prompt }], aspectRatio, resolution, 'Gemini image generation'),
		);
	}

	/**
	 * Composite a garment onto a model photo.
	 * Sends the person image first and the garment second.
	 */
	async composeTryOn(input: TryOnInput, aspectRatio?: string): Promise<GeminiImageResult> {
		const imageParts = await this.buildImageParts([input.personImage, input.garmentImage]);
		if (imageParts.length !== 2) {
			throw new BadRequestException(FileMessage.FILE_NOT_FOUND);
		}

		const prompt = buildTryOnPrompt(input.garmentDescription, input.category);
		this.logger.log(`👕 Try-on composite: category=${input.category}, garment="${input.garmentDescription}"`);

		return this.withRetry('Gemini try-on composite', () =>
			this.requestImage([{ text: prompt }, ...imageParts], aspectRatio, undefined, 'Gemini try-on composite'),
		);
	}

	/**
	 * Ask the analysis model which category a product belongs to.
	 * Returns the raw answer; alias resolution is up to the caller.
	 */
	async classifyCategory(image: string): Promise<ServiceResult<string>> {
		let client: GoogleGenAI;
		try {
			client = this.getClient();
		} catch (error: unknown) {
			return failure('not_configured', errorMessage(error));
		}

		let parts: Part[];
		try {
			parts = await this.buildImageParts([image]);
		} catch (error: unknown) {
			return failure('rejected', errorMessage(error));
		}

		try {
			const response = await this.withTimeout(
				client.models.generateContent({
					model: this.ANALYSIS_MODEL,
					contents: [{ role: 'user', parts: [{ text: CATEGORY_CLASSIFICATION_PROMPT }, ...parts] }],
				}),
				this.TIMEOUT_MS,
				'Gemini category classification',
			);

			const text = this.extractText(response);
			if (!text) {
				return failure('invalid_response', 'Gemini returned no text');
			}

			this.logger.log(`🔍 Gemini category answer: "${text}"`);
			return success(text);
		} catch (error: unknown) {
			const message = errorMessage(error);
			this.logger.error(`❌ Category classification failed: ${message}`);
			return failure(error instanceof GeminiTimeoutError ? 'timeout' : 'unavailable', message);
		}
	}

	private async withRetry(operationName: string, run: () => Promise<GeminiImageResult>): Promise<GeminiImageResult> {
		const startTime = Date.now();

		for (let attempt = 0; attempt < this.MAX_RETRIES; attempt++) {
			try {
				if (attempt > 0) {
					this.logger.log(`🔄 Retry attempt ${attempt + 1}/${this.MAX_RETRIES}...`);
					await new Promise((resolve) => setTimeout(resolve, this.RETRY_DELAY_MS));
				}
				return await run();
			} catch (error: unknown) {
				const message = errorMessage(error);
				const elapsedTime = ((Date.now() - startTime) / 1000).toFixed(2);

				// A timeout already waited long enough; a refusal will not change
				if (message.includes('timed out') || message.includes('refused') || message.includes('policy')) {
					this.logger.error(`🚫 ${operationName} not retryable: ${message}`);
					throw error;
				}

				if (attempt === this.MAX_RETRIES - 1) {
					this.logger.error(`❌ All ${this.MAX_RETRIES} attempts failed after ${elapsedTime}s`);
					throw error;
				}

				this.logger.warn(`⚠️ Attempt ${attempt + 1} failed after ${elapsedTime}s: ${message}`);
			}
		}

		throw new InternalServerErrorException(AIMessage.GEMINI_API_ERROR);
	}

	private async requestImage(
		parts: Part[],
		aspectRatio: string | undefined,
		resolution: string | undefined,
		operationName: string,
	): Promise<GeminiImageResult> {
		const client = this.getClient();
		const startTime = Date.now();
		const imageConfig = {
			aspectRatio: this.mapAspectRatioToGemini(aspectRatio),
			imageSize: this.mapResolutionToGemini(resolution),
		};

		this.logger.log(`🎨 ${operationName}: model=${this.MODEL}, config=${JSON.stringify(imageConfig)}`);

		try {
			const response = await this.withTimeout(
				client.models.generateContent({
					model: this.MODEL,
					contents: [{ role: 'user', parts }],
					config: {
						responseModalities: ['TEXT', 'IMAGE'],
						imageConfig,
						safetySettings: SAFETY_SETTINGS,
					},
				}),
				this.TIMEOUT_MS,
				operationName,
			);

			const image = this.extractImage(response);
			const elapsedTime = ((Date.now() - startTime) / 1000).toFixed(2);
			this.logger.log(`🎉 ${operationName} succeeded in ${elapsedTime}s (${image.mimeType})`);
			return image;
		} catch (error: unknown) {
			const elapsedTime = ((Date.now() - startTime) / 1000).toFixed(2);

			if (error instanceof GeminiTimeoutError) {
				this.logger.error(`⏱️ TIMEOUT: ${operationName} timed out after ${elapsedTime}s`);
				throw new InternalServerErrorException(
					`Image generation timed out after ${this.TIMEOUT_MS / 60000} minutes. Please try again.`,
				);
			}

			if (error instanceof GeminiGenerationError) {
				this.logger.error(`❌ Generation error after ${elapsedTime}s: ${error.message}`);
				throw new InternalServerErrorException(error.message);
			}

			if (error instanceof InternalServerErrorException) {
				throw error;
			}

			const message = errorMessage(error);
			this.logger.error(`❌ Gemini SDK error after ${elapsedTime}s: ${message}`);
			throw new InternalServerErrorException(`Gemini error: ${message.substring(0, 200)}`);
		}
	}

	/**
	 * Pull the first inline image out of a response.
	 * Throws GeminiGenerationError when the model refused or returned only text.
	 */
	private extractImage(response: GenerateContentResponse): GeminiImageResult {
		const candidate = response.candidates?.[0];
		if (!candidate) {
			throw new GeminiGenerationError('Gemini returned no candidates');
		}

		const parts = candidate.content?.parts ?? [];
		if (parts.length === 0) {
			const finishReason: string | undefined = candidate.finishReason;
			if (finishReason === 'IMAGE_SAFETY' || finishReason === 'SAFETY') {
				throw new GeminiGenerationError('Image generation was blocked by platform safety policy');
			}
			throw new GeminiGenerationError('Gemini returned no parts');
		}

		let textResponse = '';
		for (const part of parts) {
			if (part.text && !part.thought) {
				textResponse += part.text;
				const lowerText = part.text.toLowerCase();
				if (REFUSAL_MARKERS.some((marker) => lowerText.includes(marker))) {
					throw new GeminiGenerationError(`Model refused: ${part.text.substring(0, 300)}`);
				}
			}

			const data = part.inlineData?.data;
			if (data) {
				return { mimeType: part.inlineData?.mimeType || 'image/png', data };
			}
		}

		throw new GeminiGenerationError(
			textResponse
				? `Gemini did not generate any images. Model response: ${textResponse.substring(0, 300)}`
				: 'Gemini did not generate any images and provided no explanation.',
		);
	}

	private extractText(response: GenerateContentResponse): string {
		const parts = response.candidates?.[0]?.content?.parts ?? [];
		return parts
			.filter((part) => part.text && !part.thought)
			.map((part) => part.text ?? '')
			.join('')
			.trim();
	}

	/**
	 * Build inline image parts from local file paths, stored upload URLs or data URLs
	 */
	private async buildImageParts(images: string[]): Promise<Part[]> {
		const parts: Part[] = [];

		for (const image of images) {
			if (image.startsWith('data:')) {
				const matches = image.match(/^data:([^;]+);base64,(.+)$/);
				if (!matches) {
					this.logger.warn(`Invalid data URL: ${image.substring(0, 50)}...`);
					continue;
				}
				parts.push({ inlineData: { mimeType: matches[1], data: matches[2] } });
				continue;
			}

			const localPath = path.isAbsolute(image) ? image : path.join(process.cwd(), image.replace(/^\/+/, ''));
			if (!existsSync(localPath)) {
				this.logger.warn(`File not found: ${localPath}`);
				continue;
			}

			const buffer = await readFile(localPath);
			parts.push({ inlineData: { mimeType: guessMimeType(localPath), data: buffer.toString('base64') } });
		}

		if (parts.length === 0) {
			throw new BadRequestException('No valid images could be loaded');
		}

		return parts;
	}

	/**
	 * Get or create the Gemini client
	 */
	private getClient(): GoogleGenAI {
		if (this.client) {
			return this.client;
		}

		const apiKey = this.configService.get<string>('gemini.apiKey');
		if (!apiKey) {
			this.logger.error('❌ GEMINI_API_KEY is missing in environment variables');
			throw new InternalServerErrorException(AIMessage.API_KEY_MISSING);
		}

		this.logger.log(`🔑 Gemini client ready (model: ${this.MODEL})`);
		this.client = new GoogleGenAI({ apiKey });
		return this.client;
	}

	/**
	 * Get current API key status (masked for security)
	 */
	getApiKeyStatus(): { hasSystemKey: boolean; systemKeyMasked: string | null } {
		const apiKey = this.configService.get<string>('gemini.apiKey');
		return {
			hasSystemKey: !!apiKey,
			systemKeyMasked: apiKey ? `${apiKey.substring(0, 10)}****${apiKey.substring(apiKey.length - 4)}` : null,
		};
	}

	getModel(): string {
		return this.MODEL;
	}
}

function guessMimeType(filePath: string): string {
	switch (path.extname(filePath).toLowerCase()) {
		case '.png':
			return 'image/png';
		case '.webp':
			return 'image/webp';
		default:
			return 'image/jpeg';
	}
}
