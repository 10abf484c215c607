import { ArrayMaxSize, IsArray, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { ValidationMessage } from '../enums';

/**
 * POST /api/studio/prompts
 * Unknown categories are accepted and get the generic template.
 */
export class BuildPromptDto {
	@ApiProperty({ description: 'Raw classifier labels', example: ['Jersey', 'T-Shirt', 'blue'], type: [String] })
	@IsArray({ message: ValidationMessage.FIELD_INVALID })
	@ArrayMaxSize(50, { message: ValidationMessage.FIELD_INVALID })
	@IsString({ each: true, message: ValidationMessage.FIELD_INVALID })
	tags!: string[];

	@ApiProperty({ description: 'Category slug', example: 'upper_body' })
	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@IsNotEmpty({ message: ValidationMessage.FIELD_REQUIRED })
	@MaxLength(50, { message: ValidationMessage.FIELD_INVALID })
	category!: string;

	@ApiProperty({ example: 'front view', required: false })
	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@MaxLength(100, { message: ValidationMessage.FIELD_INVALID })
	@IsOptional()
	view_hint?: string;

	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@MaxLength(50, { message: ValidationMessage.FIELD_INVALID })
	@IsOptional()
	gender?: string;
}
