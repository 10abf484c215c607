import { GarmentCategory } from '../../libs/enums';

/**
 * Attribute kinds in lookup priority order. A raw tag listed in more than one
 * vocabulary group belongs to the group whose kind comes first here.
 */
export const TAG_KIND_PRIORITY = ['garment', 'color', 'neckline', 'sleeve', 'fit'] as const;

export type TagKind = (typeof TAG_KIND_PRIORITY)[number];

/** Member of the fixed vocabulary produced by tag normalization */
export type CanonicalTag = string;

export interface TagGroup {
	kind: TagKind;
	/** Label every synonym maps to; when absent each synonym maps to itself */
	canonical?: CanonicalTag;
	synonyms: string[];
}

export interface CategoryRule {
	category: GarmentCategory;
	terms: string[];
}

export interface PromptPair {
	readonly positive: string;
	readonly negative: string;
}

export interface CategoryTemplate {
	framing: string;
	outfit: string;
	pose: string;
	negative: string;
}

export type CategorySource = 'classifier' | 'tags';

export interface ResolvedCategory {
	category: GarmentCategory;
	source: CategorySource;
}
