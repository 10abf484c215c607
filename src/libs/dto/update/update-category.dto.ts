import { IsEnum, IsNotEmpty } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { GarmentCategory, ValidationMessage } from '../../enums';

export class UpdateCategoryDto {
	@ApiProperty({
		description: 'Category the session should use from now on',
		enum: GarmentCategory,
		example: GarmentCategory.LOWER_BODY,
	})
	@IsEnum(GarmentCategory, { message: ValidationMessage.FIELD_INVALID })
	@IsNotEmpty({ message: ValidationMessage.FIELD_REQUIRED })
	category!: GarmentCategory;
}
