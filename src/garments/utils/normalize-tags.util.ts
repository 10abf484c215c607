import { CanonicalTag } from '../../common/interfaces/garment.interface';
import { GARMENT_VOCABULARY, GarmentVocabulary, cleanTag } from './vocabulary.util';

export const FALLBACK_GARMENT_DESCRIPTION = 'fashion garment';

/**
 * Map raw classifier labels onto the canonical garment vocabulary.
 *
 * Unknown labels are dropped. Each canonical tag appears once, in the order
 * its first synonym was seen. Running the output back through is a no-op.
 */
export function normalizeTags(
	rawTags: Iterable<string>,
	vocabulary: GarmentVocabulary = GARMENT_VOCABULARY,
): CanonicalTag[] {
	const seen = new Set<CanonicalTag>();
	const result: CanonicalTag[] = [];

	for (const raw of rawTags) {
		const entry = vocabulary.lookup.get(cleanTag(raw));
		if (!entry || seen.has(entry.canonical)) continue;
		seen.add(entry.canonical);
		result.push(entry.canonical);
	}

	return result;
}

export function hasGarmentType(
	canonicalTags: readonly CanonicalTag[],
	vocabulary: GarmentVocabulary = GARMENT_VOCABULARY,
): boolean {
	return canonicalTags.some((tag) => vocabulary.lookup.get(tag)?.kind === 'garment');
}

/**
 * Garment description for prompts and the try-on service, e.g. "t-shirt, blue".
 * Without a garment-type tag the generic phrase is appended ("blue, fashion garment").
 */
export function describeGarment(
	rawTags: Iterable<string>,
	vocabulary: GarmentVocabulary = GARMENT_VOCABULARY,
): string {
	const tags = normalizeTags(rawTags, vocabulary);
	if (!hasGarmentType(tags, vocabulary)) {
		tags.push(FALLBACK_GARMENT_DESCRIPTION);
	}
	return tags.join(', ');
}
