import { IsEnum, IsIn, IsOptional, IsString } from 'class-validator';
import { GarmentCategory, ValidationMessage } from '../../enums';
import { MODEL_GENDERS } from './model-gender';

/**
 * Form fields sent with the product photo (multipart field `product_image`).
 * POST /api/studio/sessions
 */
export class CreateSessionDto {
	/** Skips classification-based category detection when set */
	@IsEnum(GarmentCategory, { message: ValidationMessage.FIELD_INVALID })
	@IsOptional()
	category?: GarmentCategory;

	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@IsIn(MODEL_GENDERS, { message: `gender must be one of: ${MODEL_GENDERS.join(', ')}` })
	@IsOptional()
	gender?: string;
}
