import { Injectable, Logger } from '@nestjs/common';
import { GarmentCategory } from '../libs/enums';
import { ServiceResult, failure, success } from '../libs/types/result/result.type';
import { resolveCategoryAlias } from '../garments/utils/infer-category.util';
import { ClaudeService } from './claude.service';
import { GeminiService } from './gemini.service';

export type CategoryProvider = 'claude' | 'gemini';

export interface CategoryClassification {
	provider: CategoryProvider;
	answer: string;
	/** Null when the answer is not a known category slug */
	category: GarmentCategory | null;
}

/**
 * Asks a vision-language model for the product category directly.
 * Claude answers first when configured; Gemini is the fallback.
 */
@Injectable()
export class CategoryClassifierService {
	private readonly logger = new Logger(CategoryClassifierService.name);

	constructor(
		private readonly claudeService: ClaudeService,
		private readonly geminiService: GeminiService,
	) { }

	async classify(
		imagePath: string,
		allowed?: readonly GarmentCategory[],
	): Promise<ServiceResult<CategoryClassification>> {
		if (this.claudeService.isConfigured()) {
			const claude = await this.claudeService.classifyCategory(imagePath);
			if (claude.ok) {
				return success(this.toClassification('claude', claude.value, allowed));
			}
			this.logger.warn(`⚠️ Claude category classification failed (${claude.kind}): ${claude.message}. Falling back to Gemini`);
		}

		const gemini = await this.geminiService.classifyCategory(imagePath);
		if (gemini.ok) {
			return success(this.toClassification('gemini', gemini.value, allowed));
		}

		this.logger.warn(`⚠️ Gemini category classification failed (${gemini.kind}): ${gemini.message}`);
		return failure(gemini.kind, gemini.message);
	}

	private toClassification(
		provider: CategoryProvider,
		answer: string,
		allowed?: readonly GarmentCategory[],
	): CategoryClassification {
		const category = resolveCategoryAlias(answer, allowed);
		if (!category) {
			this.logger.warn(`Unrecognized category answer from ${provider}: "${answer}"`);
		}
		return { provider, answer, category };
	}
}
