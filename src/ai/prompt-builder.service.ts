import { Injectable, Logger } from '@nestjs/common';
import { GarmentCategory, isGarmentCategory } from '../libs/enums';
import { VIEW_ROTATION, ViewHint } from '../libs/config';
import { CategoryTemplate, PromptPair } from '../common/interfaces/garment.interface';
import { describeGarment } from '../garments/utils/normalize-tags.util';
import {
	CATEGORY_TEMPLATES,
	GENERIC_TEMPLATE,
	QUALITY_BOILERPLATE,
	STYLE_BOILERPLATE,
} from './prompts/category-templates.prompt';

export const DEFAULT_MODEL_GENDER = 'male';

export interface ViewPromptPair extends PromptPair {
	readonly view: ViewHint;
}

// ═══════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════

/**
 * Turns garment tags and a category into positive/negative prompts for the
 * image model. All category-specific visual policy lives in the templates
 * this service reads; it never calls a model itself.
 */
@Injectable()
export class PromptBuilderService {
	private readonly logger = new Logger(PromptBuilderService.name);

	/**
	 * Build one prompt pair.
	 * Unknown categories use the generic template. A blank view hint omits the
	 * camera-angle clause and a blank gender falls back to the default.
	 */
	build(tags: Iterable<string>, category: string, viewHint?: string | null, gender?: string | null): PromptPair {
		const template = this.templateFor(category);
		const subject = gender?.trim() || DEFAULT_MODEL_GENDER;
		const view = viewHint?.trim();
		const framing = view ? `${template.framing}, ${view}` : template.framing;
		const description = describeGarment(tags);

		const positive = [
			`photo of a ${subject} fashion model`,
			framing,
			template.outfit,
			STYLE_BOILERPLATE,
			template.pose,
			QUALITY_BOILERPLATE,
			`emphasizing ${description}`,
		].join(', ');

		return Object.freeze({ positive, negative: template.negative });
	}

	/**
	 * Build `count` prompt pairs, cycling front, left three-quarter and right
	 * three-quarter views so a batch shows the garment from different angles.
	 */
	buildBatch(tags: readonly string[], category: string, count: number, gender?: string | null): ViewPromptPair[] {
		const pairs: ViewPromptPair[] = [];
		for (let i = 0; i < count; i++) {
			const view = viewForIndex(i);
			const pair = this.build(tags, category, view, gender);
			pairs.push(Object.freeze({ ...pair, view }));
		}

		this.logger.log(`🏗️ Built ${pairs.length} prompt(s) for category=${category}`);
		return pairs;
	}

	private templateFor(category: string): CategoryTemplate {
		if (!isGarmentCategory(category)) {
			this.logger.warn(`Unknown category "${category}", using generic template`);
			return GENERIC_TEMPLATE;
		}
		return CATEGORY_TEMPLATES[category] ?? GENERIC_TEMPLATE;
	}
}

export function viewForIndex(index: number): ViewHint {
	return VIEW_ROTATION[index % VIEW_ROTATION.length];
}

export function templateCategories(): GarmentCategory[] {
	return Object.values(GarmentCategory).filter((category) => CATEGORY_TEMPLATES[category] !== undefined);
}
