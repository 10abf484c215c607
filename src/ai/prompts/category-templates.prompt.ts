import { GarmentCategory } from '../../libs/enums';
import { CategoryTemplate } from '../../common/interfaces/garment.interface';

const BASE_NEGATIVE = 'text, watermark, logo, multiple people, clutter, blur, low-res, artifacts';
const EXPOSURE_NEGATIVE = 'overexposed, underexposed';

export const CATEGORY_TEMPLATES: Partial<Record<GarmentCategory, CategoryTemplate>> = {
	[GarmentCategory.UPPER_BODY]: {
		framing: 'tight shoulders-to-waist crop, face out of frame, focus on chest, sleeves and torso',
		outfit: 'plain close-fit neutral top',
		pose: 'arms slightly away from torso',
		negative: `face, eyes, head, ${BASE_NEGATIVE}, bad anatomy, extra limbs, ${EXPOSURE_NEGATIVE}`,
	},
	[GarmentCategory.LOWER_BODY]: {
		framing: 'full view from hips to shoes, torso cropped above hips, focus on pants and legs',
		outfit: 'plain neutral fitted pants',
		pose: 'standing straight, legs visible, feet shoulder-width',
		negative: `upper body, bare chest, shirt, t-shirt, hoodie, jacket, torso, face, head, ${BASE_NEGATIVE}, bad anatomy, extra limbs, ${EXPOSURE_NEGATIVE}`,
	},
	[GarmentCategory.DRESSES]: {
		framing: 'knee-up crop, full dress silhouette in frame',
		outfit: 'plain neutral dress',
		pose: 'hands relaxed by sides',
		negative: `${BASE_NEGATIVE}, bad anatomy, extra limbs, ${EXPOSURE_NEGATIVE}`,
	},
	[GarmentCategory.FOOTWEAR]: {
		framing: 'close-up feet and lower legs, shoes centered, entire shoe visible',
		outfit: 'neutral ankle-length pants exposing shoes',
		pose: 'standing, feet flat on ground',
		negative: `${BASE_NEGATIVE}, ${EXPOSURE_NEGATIVE}`,
	},
	[GarmentCategory.HEADWEAR]: {
		framing: 'tight head-and-shoulders crop, headwear centered',
		outfit: 'plain neutral top with simple neckline',
		pose: 'neutral expression',
		negative: `${BASE_NEGATIVE}, ${EXPOSURE_NEGATIVE}`,
	},
};

// Used for accessories and any category without its own template
export const GENERIC_TEMPLATE: CategoryTemplate = {
	framing: 'shoulders-to-waist crop, face out of frame',
	outfit: 'plain neutral garment',
	pose: 'neutral',
	negative: `${BASE_NEGATIVE}, ${EXPOSURE_NEGATIVE}`,
};

export const STYLE_BOILERPLATE = 'studio lighting, soft shadows, high detail, 85mm look, seamless backdrop';

export const QUALITY_BOILERPLATE = 'sharp focus, photorealistic';
