import { IsInt, IsNotEmpty, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { ValidationMessage } from '../enums';

export class SelectPreviewDto {
	@ApiProperty({ description: 'Zero-based preview index', example: 0, minimum: 0 })
	@IsInt({ message: ValidationMessage.FIELD_INVALID })
	@Min(0, { message: ValidationMessage.FIELD_INVALID })
	@IsNotEmpty({ message: ValidationMessage.FIELD_REQUIRED })
	index!: number;
}
