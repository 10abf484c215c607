import {
	BadGatewayException,
	BadRequestException,
	Injectable,
	Logger,
	NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Express } from 'express';
import 'multer';
import { randomUUID } from 'crypto';
import {
	BASE_CATEGORIES,
	BASE_TRYON_CATEGORIES,
	EXTENDED_CATEGORIES,
	EXTENDED_TRYON_CATEGORIES,
	GarmentCategory,
	NotFoundMessage,
	StudioMessage,
} from '../libs/enums';
import { DEFAULT_PREVIEW_COUNT } from '../libs/config';
import { CreateSessionDto, GeneratePreviewsDto, BuildPromptDto } from '../libs/dto';
import {
	CategoryInfo,
	ClassifierStatus,
	PreviewGenerationResponse,
	PreviewImage,
	PromptPreviewResponse,
	StudioSession,
	StudioSessionResponse,
	StudioSessionView,
	TaggingStatus,
} from '../libs/types/studio/studio.type';
import { StudioConfig } from '../config/studio.config';
import { describeGarment, normalizeTags } from '../garments/utils/normalize-tags.util';
import { isTryonSupported, resolveCategory } from '../garments/utils/infer-category.util';
import { HuggingFaceService } from '../ai/huggingface.service';
import { CategoryClassifierService } from '../ai/category-classifier.service';
import { GeminiService } from '../ai/gemini.service';
import { PromptBuilderService, templateCategories } from '../ai/prompt-builder.service';
import { FilesService, StoredImage } from '../files/files.service';
import { StudioSessionStore } from './studio-session.store';

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class StudioService {
	private readonly logger = new Logger(StudioService.name);

	constructor(
		private readonly store: StudioSessionStore,
		private readonly huggingFaceService: HuggingFaceService,
		private readonly categoryClassifier: CategoryClassifierService,
		private readonly geminiService: GeminiService,
		private readonly promptBuilder: PromptBuilderService,
		private readonly filesService: FilesService,
		private readonly configService: ConfigService,
	) { }

	// ═══════════════════════════════════════════════════════════
	// SESSIONS
	// ═══════════════════════════════════════════════════════════

	/**
	 * Store the product photo, tag it and pick a category.
	 * Tagging and classification failures are recorded on the session rather than thrown.
	 */
	async createSession(file: Express.Multer.File | undefined, dto: CreateSessionDto = {}): Promise<StudioSessionResponse> {
		const product = this.filesService.storeImage(file);
		this.logger.log(`📥 New studio session for ${product.filename}`);

		const tagResult = await this.huggingFaceService.classifyProduct(product.path);
		const rawTags = tagResult.ok ? tagResult.value : [];
		const tagging: TaggingStatus = !tagResult.ok
			? { status: 'failed', kind: tagResult.kind, message: tagResult.message }
			: rawTags.length > 0
				? { status: 'ok', tag_count: rawTags.length }
				: { status: 'empty' };

		const canonicalTags = normalizeTags(rawTags);

		let classifier: ClassifierStatus = { status: 'skipped' };
		let answer: string | null = null;
		if (!dto.category) {
			const classification = await this.categoryClassifier.classify(product.path, this.allowedCategories());
			if (classification.ok) {
				answer = classification.value.answer;
				classifier = {
					status: 'ok',
					provider: classification.value.provider,
					answer,
					accepted: classification.value.category !== null,
				};
			} else {
				classifier = { status: 'failed', kind: classification.kind, message: classification.message };
			}
		}

		const detected = resolveCategory(answer, rawTags, this.allowedCategories());
		const now = new Date();

		const session: StudioSession = {
			id: randomUUID(),
			product,
			raw_tags: rawTags,
			canonical_tags: canonicalTags,
			garment_description: describeGarment(canonicalTags),
			tagging,
			classifier,
			detected_category: detected.category,
			category_source: detected.source,
			category: dto.category ?? detected.category,
			gender: dto.gender ?? null,
			previews: [],
			selected_preview: null,
			final_image: null,
			created_at: now,
			updated_at: now,
		};

		this.store.save(session, now);
		this.logger.log(
			`✅ Session ${session.id}: ${canonicalTags.length} tag(s), category=${session.category} (${detected.source})`,
		);

		return {
			success: true,
			session: this.toView(session),
			warning: tagging.status === 'failed' ? `Product tagging unavailable: ${tagging.message}` : undefined,
			next_step: 'Generate model previews',
		};
	}

	getSession(id: string): StudioSessionResponse {
		return { success: true, session: this.toView(this.requireSession(id)) };
	}

	async deleteSession(id: string): Promise<{ success: boolean; message: string }> {
		if (!(await this.store.delete(id))) {
			throw new NotFoundException(NotFoundMessage.SESSION_NOT_FOUND);
		}
		this.logger.log(`🗑️ Session ${id} deleted`);
		return { success: true, message: 'Session deleted' };
	}

	setCategory(id: string, category: GarmentCategory): StudioSessionResponse {
		const session = this.requireSession(id);
		session.category = category;
		this.store.save(session);

		const supported = this.isTryonSupported(category);
		return {
			success: true,
			session: this.toView(session),
			warning: supported ? undefined : StudioMessage.TRYON_NOT_SUPPORTED,
		};
	}

	// ═══════════════════════════════════════════════════════════
	// GENERATION
	// ═══════════════════════════════════════════════════════════

	/**
	 * Generate model previews one by one. Failed images are skipped;
	 * an empty batch is a 502 and leaves the session as it was.
	 */
	async generatePreviews(id: string, dto: GeneratePreviewsDto = {}): Promise<PreviewGenerationResponse> {
		const session = this.requireSession(id);
		const count = dto.count ?? DEFAULT_PREVIEW_COUNT;
		const category = dto.category ?? session.category;
		const gender = dto.gender ?? session.gender;

		const pairs = this.promptBuilder.buildBatch(session.canonical_tags, category, count, gender);
		const previews: PreviewImage[] = [];

		for (const [i, pair] of pairs.entries()) {
			try {
				const result = await this.geminiService.generateImage(pair, dto.aspect_ratio, dto.resolution);
				if (!result.data) {
					this.logger.warn(`⚠️ Preview ${i + 1}/${count} returned no image data`);
					continue;
				}

				const stored = await this.filesService.storeBase64Image(result.data, result.mimeType);
				previews.push({ index: previews.length, view: pair.view, url: stored.url, path: stored.path, prompt: pair });
				this.logger.log(`🖼️ Preview ${i + 1}/${count} ready (${pair.view})`);
			} catch (error: unknown) {
				this.logger.error(`❌ Preview ${i + 1}/${count} failed: ${errorMessage(error)}`);
			}
		}

		if (previews.length === 0) {
			throw new BadGatewayException(StudioMessage.NO_PREVIEWS_GENERATED);
		}

		if (!this.store.update(session)) {
			return this.discardOrphans(id, previews.map((preview) => preview.path));
		}

		const replaced = session.previews.map((preview) => preview.path);
		if (session.final_image) replaced.push(session.final_image.path);

		session.category = category;
		session.gender = gender;
		session.previews = previews;
		session.selected_preview = null;
		session.final_image = null;
		await this.filesService.removeImages(replaced);

		return {
			success: true,
			session: this.toView(session),
			requested: count,
			generated: previews.length,
			warning: previews.length < count ? `Only ${previews.length} of ${count} previews were generated` : undefined,
			next_step: 'Select a preview',
		};
	}

	async selectPreview(id: string, index: number): Promise<StudioSessionResponse> {
		const session = this.requireSession(id);
		if (!Number.isInteger(index) || index < 0 || index >= session.previews.length) {
			throw new BadRequestException(StudioMessage.PREVIEW_INDEX_OUT_OF_RANGE);
		}

		const stale = session.final_image;
		session.selected_preview = index;
		session.final_image = null;
		this.store.save(session);
		if (stale) {
			await this.filesService.removeImages([stale.path]);
		}

		return {
			success: true,
			session: this.toView(session),
			next_step: this.isTryonSupported(session.category) ? 'Run virtual try-on' : undefined,
		};
	}

	/**
	 * Composite the product onto the selected preview.
	 */
	async runTryOn(id: string): Promise<StudioSessionResponse> {
		const session = this.requireSession(id);
		const preview = session.selected_preview === null ? undefined : session.previews[session.selected_preview];
		if (!preview) {
			throw new BadRequestException(StudioMessage.NO_PREVIEW_SELECTED);
		}
		if (!this.isTryonSupported(session.category)) {
			throw new BadRequestException(`${StudioMessage.TRYON_NOT_SUPPORTED}: ${session.category}`);
		}

		let finalImage: StoredImage;
		try {
			finalImage = await this.composite(session, preview);
		} catch (error: unknown) {
			const message = errorMessage(error);
			this.logger.error(`❌ Try-on failed for session ${id}: ${message}`);
			throw new BadGatewayException(`${StudioMessage.TRYON_FAILED}: ${message}`);
		}

		if (!this.store.update(session)) {
			return this.discardOrphans(id, [finalImage.path]);
		}

		const replaced = session.final_image;
		session.final_image = finalImage;
		if (replaced) {
			await this.filesService.removeImages([replaced.path]);
		}
		this.logger.log(`👗 Try-on complete for session ${id}`);

		return { success: true, session: this.toView(session), message: 'Try-on complete' };
	}

	// ═══════════════════════════════════════════════════════════
	// CATALOG
	// ═══════════════════════════════════════════════════════════

	listCategories(): CategoryInfo[] {
		const withTemplate = new Set(templateCategories());
		return this.allowedCategories().map((category) => ({
			category,
			tryon_supported: this.isTryonSupported(category),
			has_template: withTemplate.has(category),
		}));
	}

	buildPromptPreview(dto: BuildPromptDto): PromptPreviewResponse {
		const canonicalTags = normalizeTags(dto.tags);
		return {
			success: true,
			canonical_tags: canonicalTags,
			garment_description: describeGarment(dto.tags),
			category: dto.category,
			prompt: this.promptBuilder.build(dto.tags, dto.category, dto.view_hint, dto.gender),
		};
	}

	toView(session: StudioSession): StudioSessionView {
		return {
			id: session.id,
			product_image_url: session.product.url,
			raw_tags: session.raw_tags,
			canonical_tags: session.canonical_tags,
			garment_description: session.garment_description,
			tagging: session.tagging,
			classifier: session.classifier,
			detected_category: session.detected_category,
			category_source: session.category_source,
			category: session.category,
			tryon_supported: this.isTryonSupported(session.category),
			previews: session.previews.map(({ index, view, url }) => ({ index, view, url })),
			selected_preview: session.selected_preview,
			final_image_url: session.final_image?.url ?? null,
			created_at: session.created_at.toISOString(),
			updated_at: session.updated_at.toISOString(),
		};
	}

	/** The preprocessed garment is a temporary file and is removed whatever the outcome */
	private async composite(session: StudioSession, preview: PreviewImage): Promise<StoredImage> {
		const garment = await this.filesService.preprocessGarment(session.product.path);
		try {
			const result = await this.geminiService.composeTryOn({
				personImage: this.filesService.resolveLocalPath(preview.url),
				garmentImage: garment.path,
				garmentDescription: session.garment_description,
				category: session.category,
			});
			if (!result.data) {
				throw new Error('Try-on returned no image data');
			}

			return await this.filesService.storeBase64Image(result.data, result.mimeType);
		} finally {
			await this.filesService.removeImages([garment.path]);
		}
	}

	/** The session went away while its images were being generated */
	private async discardOrphans(id: string, paths: string[]): Promise<never> {
		this.logger.warn(`⚠️ Session ${id} was removed mid-generation, discarding ${paths.length} image(s)`);
		await this.filesService.removeImages(paths);
		throw new NotFoundException(NotFoundMessage.SESSION_NOT_FOUND);
	}

	private requireSession(id: string): StudioSession {
		const session = this.store.get(id);
		if (!session) {
			throw new NotFoundException(NotFoundMessage.SESSION_NOT_FOUND);
		}
		return session;
	}

	private isTryonSupported(category: GarmentCategory): boolean {
		return isTryonSupported(category, this.extended() ? EXTENDED_TRYON_CATEGORIES : BASE_TRYON_CATEGORIES);
	}

	private allowedCategories(): readonly GarmentCategory[] {
		return this.extended() ? EXTENDED_CATEGORIES : BASE_CATEGORIES;
	}

	private extended(): boolean {
		return this.configService.get<StudioConfig>('studio')?.extendedTryonCategories ?? false;
	}
}
