import { IsEnum, IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { GarmentCategory, ValidationMessage } from '../enums';
import { MAX_PREVIEW_COUNT, VALID_ASPECT_RATIOS, VALID_IMAGE_SIZES } from '../config';
import { MODEL_GENDERS } from './create/model-gender';

export class GeneratePreviewsDto {
	@ApiProperty({ description: 'Number of previews', example: 3, minimum: 1, maximum: MAX_PREVIEW_COUNT, required: false })
	@IsInt({ message: ValidationMessage.FIELD_INVALID })
	@Min(1, { message: 'count must be at least 1' })
	@Max(MAX_PREVIEW_COUNT, { message: `count must be at most ${MAX_PREVIEW_COUNT}` })
	@IsOptional()
	count?: number;

	@ApiProperty({ enum: MODEL_GENDERS, example: 'female', required: false })
	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@IsIn(MODEL_GENDERS, { message: `gender must be one of: ${MODEL_GENDERS.join(', ')}` })
	@IsOptional()
	gender?: string;

	/** Overrides the session category for this batch and onwards */
	@ApiProperty({ enum: GarmentCategory, required: false })
	@IsEnum(GarmentCategory, { message: ValidationMessage.FIELD_INVALID })
	@IsOptional()
	category?: GarmentCategory;

	@ApiProperty({ enum: [...VALID_ASPECT_RATIOS], example: '3:4', required: false })
	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@IsIn([...VALID_ASPECT_RATIOS], { message: `aspect_ratio must be one of: ${VALID_ASPECT_RATIOS.join(', ')}` })
	@IsOptional()
	aspect_ratio?: string;

	@ApiProperty({ enum: [...VALID_IMAGE_SIZES], example: '1K', required: false })
	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@IsIn([...VALID_IMAGE_SIZES], { message: `resolution must be one of: ${VALID_IMAGE_SIZES.join(', ')}` })
	@IsOptional()
	resolution?: string;
}
