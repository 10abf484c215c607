import vocabularyJson from '../data/garment-vocabulary.json';
import { GarmentCategory, isGarmentCategory } from '../../libs/enums';
import {
	CanonicalTag,
	CategoryRule,
	TAG_KIND_PRIORITY,
	TagGroup,
	TagKind,
} from '../../common/interfaces/garment.interface';

export interface GarmentVocabulary {
	/** Groups ordered by kind priority, then by file order */
	tagGroups: TagGroup[];
	/** Raw tag -> canonical tag, resolved with the group order above */
	lookup: ReadonlyMap<string, { canonical: CanonicalTag; kind: TagKind }>;
	categoryRules: CategoryRule[];
	defaultCategory: GarmentCategory;
}

/** Lowercase, trim and collapse inner whitespace */
export function cleanTag(tag: string): string {
	return tag.trim().toLowerCase().replace(/\s+/g, ' ');
}

function isTagKind(value: unknown): value is TagKind {
	return TAG_KIND_PRIORITY.some((kind) => kind === value);
}

function toStringList(value: unknown, where: string): string[] {
	if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
		throw new Error(`Garment vocabulary: ${where} must be a list of strings`);
	}
	return value.map((item: string) => cleanTag(item));
}

/**
 * Validate raw vocabulary data and build the lookup tables.
 * Throws when the data would make normalization non-idempotent.
 */
export function buildVocabulary(raw: {
	tagGroups: ReadonlyArray<{ kind: string; canonical?: string; synonyms: ReadonlyArray<string> }>;
	categoryRules: ReadonlyArray<{ category: string; terms: ReadonlyArray<string> }>;
	defaultCategory: string;
}): GarmentVocabulary {
	const parsedGroups: TagGroup[] = raw.tagGroups.map((group, index) => {
		if (!isTagKind(group.kind)) {
			throw new Error(`Garment vocabulary: tag group ${index} has unknown kind "${group.kind}"`);
		}
		const synonyms = toStringList(group.synonyms, `tag group ${index} synonyms`);
		return group.canonical === undefined
			? { kind: group.kind, synonyms }
			: { kind: group.kind, canonical: cleanTag(group.canonical), synonyms };
	});

	// Array.prototype.sort is stable, so file order survives within a kind
	const tagGroups = [...parsedGroups].sort(
		(a, b) => TAG_KIND_PRIORITY.indexOf(a.kind) - TAG_KIND_PRIORITY.indexOf(b.kind),
	);

	const lookup = new Map<string, { canonical: CanonicalTag; kind: TagKind }>();
	for (const group of tagGroups) {
		for (const synonym of group.synonyms) {
			if (!lookup.has(synonym)) {
				lookup.set(synonym, { canonical: group.canonical ?? synonym, kind: group.kind });
			}
		}
	}

	for (const { canonical } of lookup.values()) {
		if (lookup.get(canonical)?.canonical !== canonical) {
			throw new Error(`Garment vocabulary: canonical tag "${canonical}" must map to itself`);
		}
	}

	const categoryRules: CategoryRule[] = raw.categoryRules.map((rule, index) => {
		if (!isGarmentCategory(rule.category)) {
			throw new Error(`Garment vocabulary: category rule ${index} has unknown category "${rule.category}"`);
		}
		return { category: rule.category, terms: toStringList(rule.terms, `category rule ${index} terms`) };
	});

	if (!isGarmentCategory(raw.defaultCategory)) {
		throw new Error(`Garment vocabulary: unknown default category "${raw.defaultCategory}"`);
	}

	return { tagGroups, lookup, categoryRules, defaultCategory: raw.defaultCategory };
}

export const GARMENT_VOCABULARY: GarmentVocabulary = buildVocabulary(vocabularyJson);
