import {
	BASE_CATEGORIES,
	BASE_TRYON_CATEGORIES,
	GarmentCategory,
	isGarmentCategory,
} from '../../libs/enums';
import { ResolvedCategory } from '../../common/interfaces/garment.interface';
import { GARMENT_VOCABULARY, GarmentVocabulary, cleanTag } from './vocabulary.util';

/**
 * Pick the garment category for a tag set.
 * Rules are checked in order (dresses, headwear, footwear, lower body, upper body)
 * and the first rule with a matching term wins.
 */
export function inferCategory(
	tags: Iterable<string>,
	vocabulary: GarmentVocabulary = GARMENT_VOCABULARY,
): GarmentCategory {
	const present = new Set<string>();
	for (const tag of tags) {
		present.add(cleanTag(tag));
	}

	const match = vocabulary.categoryRules.find((rule) => rule.terms.some((term) => present.has(term)));
	return match ? match.category : vocabulary.defaultCategory;
}

const CATEGORY_ALIASES: ReadonlyMap<string, GarmentCategory> = new Map([
	['dress', GarmentCategory.DRESSES],
	['head_wear', GarmentCategory.HEADWEAR],
	['head_gear', GarmentCategory.HEADWEAR],
	['headgear', GarmentCategory.HEADWEAR],
	['shoes', GarmentCategory.FOOTWEAR],
	['foot_wear', GarmentCategory.FOOTWEAR],
	['upperbody', GarmentCategory.UPPER_BODY],
	['lowerbody', GarmentCategory.LOWER_BODY],
	['accessory', GarmentCategory.ACCESSORIES],
]);

/**
 * Turn a free-text classifier answer ("Dress.", "head wear", "Upper Body")
 * into a category slug. Returns null when the answer is not in `allowed`.
 */
export function resolveCategoryAlias(
	answer: string | null | undefined,
	allowed: readonly GarmentCategory[] = BASE_CATEGORIES,
): GarmentCategory | null {
	if (!answer) return null;

	const slug = answer
		.trim()
		.toLowerCase()
		.replace(/^[\s"'`*.:,;!?]+|[\s"'`*.:,;!?]+$/g, '')
		.replace(/[\s-]+/g, '_');

	const resolved = CATEGORY_ALIASES.get(slug) ?? slug;
	if (!isGarmentCategory(resolved)) return null;
	return allowed.includes(resolved) ? resolved : null;
}

/** Prefer a valid classifier answer, otherwise infer from tags */
export function resolveCategory(
	classifierAnswer: string | null | undefined,
	tags: Iterable<string>,
	allowed: readonly GarmentCategory[] = BASE_CATEGORIES,
): ResolvedCategory {
	const fromClassifier = resolveCategoryAlias(classifierAnswer, allowed);
	if (fromClassifier) {
		return { category: fromClassifier, source: 'classifier' };
	}
	return { category: inferCategory(tags), source: 'tags' };
}

export function isTryonSupported(
	category: string,
	supported: readonly GarmentCategory[] = BASE_TRYON_CATEGORIES,
): boolean {
	return isGarmentCategory(category) && supported.includes(category);
}
