export enum GarmentCategory {
	UPPER_BODY = 'upper_body',
	LOWER_BODY = 'lower_body',
	DRESSES = 'dresses',
	FOOTWEAR = 'footwear',
	HEADWEAR = 'headwear',
	ACCESSORIES = 'accessories',
}

/** The closed set a product can be categorized into */
export const BASE_CATEGORIES: readonly GarmentCategory[] = [
	GarmentCategory.UPPER_BODY,
	GarmentCategory.LOWER_BODY,
	GarmentCategory.DRESSES,
	GarmentCategory.FOOTWEAR,
	GarmentCategory.HEADWEAR,
];

export const EXTENDED_CATEGORIES: readonly GarmentCategory[] = [...BASE_CATEGORIES, GarmentCategory.ACCESSORIES];

export const BASE_TRYON_CATEGORIES: readonly GarmentCategory[] = [
	GarmentCategory.UPPER_BODY,
	GarmentCategory.LOWER_BODY,
	GarmentCategory.DRESSES,
];

export const EXTENDED_TRYON_CATEGORIES: readonly GarmentCategory[] = [
	...BASE_TRYON_CATEGORIES,
	GarmentCategory.FOOTWEAR,
	GarmentCategory.HEADWEAR,
	GarmentCategory.ACCESSORIES,
];

const CATEGORY_VALUES: ReadonlySet<string> = new Set(Object.values(GarmentCategory));

export function isGarmentCategory(value: unknown): value is GarmentCategory {
	return typeof value === 'string' && CATEGORY_VALUES.has(value);
}
