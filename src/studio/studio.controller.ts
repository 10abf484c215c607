import {
	Body,
	Controller,
	Delete,
	Get,
	Param,
	ParseUUIDPipe,
	Post,
	Put,
	UploadedFile,
	UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Express } from 'express';
import 'multer';
import { StudioService } from './studio.service';
import {
	BuildPromptDto,
	CreateSessionDto,
	GeneratePreviewsDto,
	SelectPreviewDto,
	UpdateCategoryDto,
} from '../libs/dto';
import {
	CategoryInfo,
	PreviewGenerationResponse,
	PromptPreviewResponse,
	StudioSessionResponse,
} from '../libs/types/studio/studio.type';

@Controller('studio')
export class StudioController {
	constructor(private readonly studioService: StudioService) { }

	/**
	 * Upload a product photo and start a session
	 * POST /api/studio/sessions
	 * FormData: product_image (required), category (optional), gender (optional)
	 */
	@Post('sessions')
	@UseInterceptors(FileInterceptor('product_image'))
	async createSession(
		@UploadedFile() productImage: Express.Multer.File | undefined,
		@Body() dto: CreateSessionDto,
	): Promise<StudioSessionResponse> {
		return this.studioService.createSession(productImage, dto);
	}

	@Get('sessions/:id')
	getSession(@Param('id', ParseUUIDPipe) id: string): StudioSessionResponse {
		return this.studioService.getSession(id);
	}

	@Delete('sessions/:id')
	async deleteSession(@Param('id', ParseUUIDPipe) id: string): Promise<{ success: boolean; message: string }> {
		return this.studioService.deleteSession(id);
	}

	@Put('sessions/:id/category')
	setCategory(
		@Param('id', ParseUUIDPipe) id: string,
		@Body() dto: UpdateCategoryDto,
	): StudioSessionResponse {
		return this.studioService.setCategory(id, dto.category);
	}

	/**
	 * Generate model previews
	 * POST /api/studio/sessions/:id/previews
	 */
	@Post('sessions/:id/previews')
	async generatePreviews(
		@Param('id', ParseUUIDPipe) id: string,
		@Body() dto: GeneratePreviewsDto,
	): Promise<PreviewGenerationResponse> {
		return this.studioService.generatePreviews(id, dto);
	}

	@Post('sessions/:id/select')
	async selectPreview(
		@Param('id', ParseUUIDPipe) id: string,
		@Body() dto: SelectPreviewDto,
	): Promise<StudioSessionResponse> {
		return this.studioService.selectPreview(id, dto.index);
	}

	/**
	 * Composite the product onto the selected preview
	 * POST /api/studio/sessions/:id/tryon
	 */
	@Post('sessions/:id/tryon')
	async runTryOn(@Param('id', ParseUUIDPipe) id: string): Promise<StudioSessionResponse> {
		return this.studioService.runTryOn(id);
	}

	@Get('categories')
	listCategories(): { success: boolean; categories: CategoryInfo[] } {
		return { success: true, categories: this.studioService.listCategories() };
	}

	/**
	 * Preview the prompt pair for a tag set without calling any model
	 * POST /api/studio/prompts
	 */
	@Post('prompts')
	buildPrompt(@Body() dto: BuildPromptDto): PromptPreviewResponse {
		return this.studioService.buildPromptPreview(dto);
	}
}
