import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { HF_TOP_K } from '../libs/config';
import { HuggingFaceConfig } from '../config/huggingface.config';
import { ServiceResult, failure, success } from '../libs/types/result/result.type';

/**
 * Image classification through the Hugging Face Inference API.
 * Produces the raw tags the garment pipeline normalizes.
 */
@Injectable()
export class HuggingFaceService {
	private readonly logger = new Logger(HuggingFaceService.name);

	constructor(private readonly configService: ConfigService) { }

	/**
	 * Classify a product photo and return its labels, lowercased, split on
	 * commas and deduplicated in ranking order. `ok` with an empty list means
	 * the model answered but recognized nothing.
	 */
	async classifyProduct(imagePath: string, topK: number = HF_TOP_K): Promise<ServiceResult<string[]>> {
		const config = this.configService.get<HuggingFaceConfig>('huggingface');
		if (!config?.apiToken) {
			this.logger.warn('HF_API_TOKEN is missing, skipping product classification');
			return failure('not_configured', 'HF_API_TOKEN is not configured');
		}

		let body: Buffer;
		try {
			body = await readFile(imagePath);
		} catch (error: unknown) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger.error(`❌ Could not read product image: ${message}`);
			return failure('rejected', message);
		}

		const url = `${config.baseUrl}/${config.model}`;
		const startTime = Date.now();

		let response: Response;
		try {
			response = await fetch(url, {
				method: 'POST',
				headers: {
					Authorization: `Bearer ${config.apiToken}`,
					'Content-Type': 'application/octet-stream',
				},
				body: new Uint8Array(body),
				signal: AbortSignal.timeout(config.timeoutMs),
			});
		} catch (error: unknown) {
			if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
				this.logger.error(`⏱️ Classification timed out after ${config.timeoutMs / 1000}s`);
				return failure('timeout', `Classification timed out after ${config.timeoutMs / 1000} seconds`);
			}
			const message = error instanceof Error ? error.message : String(error);
			this.logger.error(`❌ Classification request failed: ${message}`);
			return failure('unavailable', message);
		}

		const elapsedTime = ((Date.now() - startTime) / 1000).toFixed(2);

		let data: unknown;
		try {
			data = await response.json();
		} catch {
			this.logger.error(`❌ Classification returned non-JSON body (status ${response.status})`);
			return failure(response.ok ? 'invalid_response' : 'unavailable', `HTTP ${response.status}`);
		}

		const apiError = extractError(data);
		if (apiError) {
			this.logger.warn(`⚠️ Classifier rejected request: ${apiError}`);
			return failure('rejected', apiError);
		}

		if (!response.ok) {
			this.logger.error(`❌ Classification failed with HTTP ${response.status}`);
			return failure('unavailable', `HTTP ${response.status}`);
		}

		const labels = extractLabels(data, topK);
		if (labels === null) {
			this.logger.error('❌ Classification response has an unexpected shape');
			return failure('invalid_response', 'Unexpected classification response');
		}

		this.logger.log(`🏷️ Classified product in ${elapsedTime}s: [${labels.join(', ')}]`);
		return success(labels);
	}

	getApiKeyStatus(): { hasSystemKey: boolean; systemKeyMasked: string | null; model: string | null } {
		const config = this.configService.get<HuggingFaceConfig>('huggingface');
		const token = config?.apiToken;
		return {
			hasSystemKey: !!token,
			systemKeyMasked: token ? `${token.substring(0, 6)}****${token.substring(token.length - 4)}` : null,
			model: config?.model ?? null,
		};
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractError(data: unknown): string | null {
	if (isRecord(data) && data.error) {
		return typeof data.error === 'string' ? data.error : JSON.stringify(data.error);
	}
	return null;
}

/** Accepts `[{label, score}]`, `{labels: [...]}` or a list of strings */
export function extractLabels(data: unknown, topK: number = HF_TOP_K): string[] | null {
	const items = isRecord(data) && 'labels' in data ? data.labels : data;
	if (!Array.isArray(items)) return null;

	const labels: string[] = [];
	for (const item of items.slice(0, topK)) {
		if (typeof item === 'string') {
			labels.push(...explodeLabel(item));
		} else if (isRecord(item) && 'label' in item) {
			labels.push(...explodeLabel(String(item.label)));
		}
	}

	return [...new Set(labels)];
}

function explodeLabel(label: string): string[] {
	return label
		.toLowerCase()
		.split(',')
		.map((part) => part.trim())
		.filter((part) => part.length > 0);
}
