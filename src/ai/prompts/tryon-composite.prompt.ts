import { GarmentCategory } from '../../libs/enums';

const REGION_INSTRUCTIONS: Partial<Record<GarmentCategory, string>> = {
	[GarmentCategory.UPPER_BODY]: 'Replace only the top the model is wearing. Keep pants, shoes and accessories unchanged.',
	[GarmentCategory.LOWER_BODY]: 'Replace only the pants, shorts or skirt the model is wearing. Keep the top and shoes unchanged.',
	[GarmentCategory.DRESSES]: 'Replace the whole outfit between shoulders and knees with the dress.',
	[GarmentCategory.FOOTWEAR]: 'Replace only the shoes the model is wearing. Keep all clothing unchanged.',
	[GarmentCategory.HEADWEAR]: 'Place the headwear on the model\'s head. Keep all clothing unchanged.',
	[GarmentCategory.ACCESSORIES]: 'Add the accessory to the model in its natural position. Keep all clothing unchanged.',
};

/**
 * Instruction sent with [person image, garment image] to the image model.
 */
export function buildTryOnPrompt(garmentDescription: string, category: GarmentCategory): string {
	const region = REGION_INSTRUCTIONS[category] ?? 'Dress the model in the garment.';

	return `Virtual try-on. The FIRST image is a fashion model photo. The SECOND image is a product photo of a garment (${garmentDescription}).

Generate ONE photorealistic image of the SAME model wearing the garment from the second image.
${region}

RULES:
- Preserve the model's pose, body shape, framing, lighting and background exactly.
- Reproduce the garment's exact color, pattern, print, logo and texture.
- Fit the garment naturally with realistic folds and shadows.
- Do NOT add text, watermarks or extra people.`;
}
