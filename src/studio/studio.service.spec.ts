import { BadGatewayException, BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import type { Express } from 'express';
import 'multer';
import { Readable } from 'stream';
import { BASE_CATEGORIES, GarmentCategory, NotFoundMessage, StudioMessage } from '../libs/enums';
import { failure, success } from '../libs/types/result/result.type';
import { StudioConfig } from '../config/studio.config';
import { HuggingFaceService } from '../ai/huggingface.service';
import { CategoryClassifierService } from '../ai/category-classifier.service';
import { GeminiService } from '../ai/gemini.service';
import { PromptBuilderService } from '../ai/prompt-builder.service';
import { FilesService } from '../files/files.service';
import { StudioService } from './studio.service';
import { StudioSessionStore } from './studio-session.store';

const PRODUCT = {
	filename: 'product.png',
	mimetype: 'image/png',
	path: '/srv/uploads/product.png',
	url: '/uploads/product.png',
};

function uploadedFile(): Express.Multer.File {
	return {
		fieldname: 'product_image',
		originalname: 'tee.png',
		encoding: '7bit',
		mimetype: 'image/png',
		size: 4,
		stream: Readable.from([]),
		destination: '/srv/uploads',
		filename: 'product.png',
		path: '/srv/uploads/product.png',
		buffer: Buffer.alloc(0),
	};
}

describe('StudioService', () => {
	let service: StudioService;

	const huggingFace = { classifyProduct: jest.fn() };
	const classifier = { classify: jest.fn() };
	const gemini = { generateImage: jest.fn(), composeTryOn: jest.fn() };
	const files = {
		storeImage: jest.fn(),
		storeBase64Image: jest.fn(),
		preprocessGarment: jest.fn(),
		resolveLocalPath: jest.fn(),
		removeImages: jest.fn(),
	};

	const setup = async (studio: StudioConfig = { sessionTtlMinutes: 60, extendedTryonCategories: false }) => {
		const moduleRef = await Test.createTestingModule({
			providers: [
				StudioService,
				StudioSessionStore,
				PromptBuilderService,
				{ provide: ConfigService, useValue: new ConfigService({ studio }) },
				{ provide: HuggingFaceService, useValue: huggingFace },
				{ provide: CategoryClassifierService, useValue: classifier },
				{ provide: GeminiService, useValue: gemini },
				{ provide: FilesService, useValue: files },
			],
		}).compile();

		service = moduleRef.get(StudioService);
	};

	const createTeeSession = async () => {
		huggingFace.classifyProduct.mockResolvedValue(success(['jersey', 't-shirt', 'blue']));
		classifier.classify.mockResolvedValue(
			success({ provider: 'claude', answer: 'Upper Body', category: GarmentCategory.UPPER_BODY }),
		);
		return (await service.createSession(uploadedFile())).session;
	};

	beforeEach(async () => {
		jest.resetAllMocks();
		files.storeImage.mockReturnValue(PRODUCT);
		files.storeBase64Image.mockImplementation(async (data: string, mimetype: string) => ({
			filename: `${data}.png`,
			mimetype,
			path: `/srv/uploads/${data}.png`,
			url: `/uploads/${data}.png`,
		}));
		files.preprocessGarment.mockResolvedValue({ ...PRODUCT, filename: 'garment.png', path: '/srv/uploads/garment.png' });
		files.resolveLocalPath.mockImplementation((url: string) => `/srv${url}`);
		files.removeImages.mockResolvedValue(0);
		await setup();
	});

	describe('createSession', () => {
		it('tags the product and takes the classifier category', async () => {
			const session = await createTeeSession();

			expect(session).toMatchObject({
				product_image_url: '/uploads/product.png',
				raw_tags: ['jersey', 't-shirt', 'blue'],
				canonical_tags: ['t-shirt', 'blue'],
				garment_description: 't-shirt, blue',
				tagging: { status: 'ok', tag_count: 3 },
				classifier: { status: 'ok', provider: 'claude', answer: 'Upper Body', accepted: true },
				detected_category: GarmentCategory.UPPER_BODY,
				category_source: 'classifier',
				category: GarmentCategory.UPPER_BODY,
				tryon_supported: true,
				previews: [],
				selected_preview: null,
				final_image_url: null,
			});
			expect(classifier.classify).toHaveBeenLastCalledWith('/srv/uploads/product.png', BASE_CATEGORIES);
		});

		it('records a tagging failure and keeps going', async () => {
			huggingFace.classifyProduct.mockResolvedValue(failure('timeout', 'Classification timed out after 30 seconds'));
			classifier.classify.mockResolvedValue(failure('unavailable', 'down'));

			const response = await service.createSession(uploadedFile());

			expect(response.warning).toBe('Product tagging unavailable: Classification timed out after 30 seconds');
			expect(response.session).toMatchObject({
				raw_tags: [],
				canonical_tags: [],
				garment_description: 'fashion garment',
				tagging: { status: 'failed', kind: 'timeout', message: 'Classification timed out after 30 seconds' },
				classifier: { status: 'failed', kind: 'unavailable', message: 'down' },
				category: GarmentCategory.UPPER_BODY,
				category_source: 'tags',
			});
		});

		it('infers from tags when the classifier answer is not a category', async () => {
			huggingFace.classifyProduct.mockResolvedValue(success(['gown', 'red']));
			classifier.classify.mockResolvedValue(success({ provider: 'gemini', answer: 'handbag', category: null }));

			const { session } = await service.createSession(uploadedFile());

			expect(session.classifier).toEqual({ status: 'ok', provider: 'gemini', answer: 'handbag', accepted: false });
			expect(session.category).toBe(GarmentCategory.DRESSES);
			expect(session.category_source).toBe('tags');
		});

		it('skips the classifier when a category is given', async () => {
			huggingFace.classifyProduct.mockResolvedValue(success(['jeans']));

			const { session } = await service.createSession(uploadedFile(), { category: GarmentCategory.FOOTWEAR });

			expect(classifier.classify).not.toHaveBeenCalled();
			expect(session.classifier).toEqual({ status: 'skipped' });
			expect(session.detected_category).toBe(GarmentCategory.LOWER_BODY);
			expect(session.category).toBe(GarmentCategory.FOOTWEAR);
			expect(session.tryon_supported).toBe(false);
		});
	});

	describe('sessions', () => {
		it('throws for unknown sessions', async () => {
			expect(() => service.getSession('missing')).toThrow(NotFoundException);
			await expect(service.deleteSession('missing')).rejects.toThrow(NotFoundException);
		});

		it('deletes a session', async () => {
			const session = await createTeeSession();

			await expect(service.deleteSession(session.id)).resolves.toEqual({ success: true, message: 'Session deleted' });
			expect(() => service.getSession(session.id)).toThrow(NotFoundException);
		});

		it('removes every file of a deleted session', async () => {
			const session = await createTeeSession();
			gemini.generateImage
				.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p0' })
				.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p1' });
			await service.generatePreviews(session.id, { count: 2 });
			await service.selectPreview(session.id, 1);
			gemini.composeTryOn.mockResolvedValue({ mimeType: 'image/png', data: 'final' });
			await service.runTryOn(session.id);

			await service.deleteSession(session.id);

			expect(files.removeImages).toHaveBeenLastCalledWith([
				'/srv/uploads/product.png',
				'/srv/uploads/p0.png',
				'/srv/uploads/p1.png',
				'/srv/uploads/final.png',
			]);
		});

		it('warns when the chosen category cannot be composited', async () => {
			const session = await createTeeSession();

			const footwear = service.setCategory(session.id, GarmentCategory.FOOTWEAR);
			expect(footwear.warning).toBe(StudioMessage.TRYON_NOT_SUPPORTED);
			expect(footwear.session.tryon_supported).toBe(false);

			const dresses = service.setCategory(session.id, GarmentCategory.DRESSES);
			expect(dresses.warning).toBeUndefined();
			expect(service.getSession(session.id).session.category).toBe(GarmentCategory.DRESSES);
		});
	});

	describe('generatePreviews', () => {
		it('skips failed images and reports the shortfall', async () => {
			const session = await createTeeSession();
			gemini.generateImage
				.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p0' })
				.mockRejectedValueOnce(new Error('Gemini error: overloaded'))
				.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p2' });

			const response = await service.generatePreviews(session.id, { gender: 'female', aspect_ratio: '4:5' });

			expect(response.requested).toBe(3);
			expect(response.generated).toBe(2);
			expect(response.warning).toBe('Only 2 of 3 previews were generated');
			expect(response.session.previews).toEqual([
				{ index: 0, view: 'front view', url: '/uploads/p0.png' },
				{ index: 1, view: 'right three-quarter view', url: '/uploads/p2.png' },
			]);

			const [firstPair, aspectRatio, resolution] = gemini.generateImage.mock.calls[0];
			expect(firstPair.positive.startsWith('photo of a female fashion model, tight shoulders-to-waist crop')).toBe(true);
			expect(firstPair.positive.endsWith('emphasizing t-shirt, blue')).toBe(true);
			expect(aspectRatio).toBe('4:5');
			expect(resolution).toBeUndefined();
		});

		it('generates the requested count with the overridden category', async () => {
			const session = await createTeeSession();
			gemini.generateImage.mockResolvedValue({ mimeType: 'image/png', data: 'img' });

			const response = await service.generatePreviews(session.id, { count: 5, category: GarmentCategory.LOWER_BODY });

			expect(gemini.generateImage).toHaveBeenCalledTimes(5);
			expect(response.generated).toBe(5);
			expect(response.warning).toBeUndefined();
			expect(response.session.category).toBe(GarmentCategory.LOWER_BODY);
			expect(response.session.previews.map((preview) => preview.view)).toEqual([
				'front view',
				'left three-quarter view',
				'right three-quarter view',
				'front view',
				'left three-quarter view',
			]);
		});

		it('fails with 502 when no image was produced', async () => {
			const session = await createTeeSession();
			gemini.generateImage.mockRejectedValue(new Error('Gemini error: quota exceeded'));

			await expect(service.generatePreviews(session.id, { count: 2 })).rejects.toThrow(
				new BadGatewayException(StudioMessage.NO_PREVIEWS_GENERATED),
			);
			expect(service.getSession(session.id).session.previews).toEqual([]);
		});

		it('leaves the session untouched when an overriding batch fails', async () => {
			const session = await createTeeSession();
			gemini.generateImage.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p0' });
			await service.generatePreviews(session.id, { count: 1 });
			await service.selectPreview(session.id, 0);

			gemini.generateImage.mockRejectedValue(new Error('Gemini error: quota exceeded'));
			await expect(
				service.generatePreviews(session.id, { count: 1, category: GarmentCategory.LOWER_BODY, gender: 'female' }),
			).rejects.toThrow(BadGatewayException);

			expect(service.getSession(session.id).session).toMatchObject({
				category: GarmentCategory.UPPER_BODY,
				previews: [{ index: 0, view: 'front view', url: '/uploads/p0.png' }],
				selected_preview: 0,
			});

			gemini.generateImage.mockReset();
			gemini.generateImage.mockResolvedValue({ mimeType: 'image/png', data: 'p1' });
			await service.generatePreviews(session.id, { count: 1 });
			const [pair] = gemini.generateImage.mock.calls[0];
			expect(pair.positive.startsWith('photo of a male fashion model, tight shoulders-to-waist crop')).toBe(true);
		});

		it('removes the replaced previews when a new batch lands', async () => {
			const session = await createTeeSession();
			gemini.generateImage
				.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p0' })
				.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p1' });
			await service.generatePreviews(session.id, { count: 1 });

			await service.generatePreviews(session.id, { count: 1 });

			expect(files.removeImages).toHaveBeenLastCalledWith(['/srv/uploads/p0.png']);
			expect(service.getSession(session.id).session.previews).toEqual([
				{ index: 0, view: 'front view', url: '/uploads/p1.png' },
			]);
		});

		it('does not bring back a session deleted while images were generating', async () => {
			const session = await createTeeSession();
			let release: (image: { mimeType: string; data: string }) => void = () => undefined;
			gemini.generateImage.mockImplementationOnce(
				() =>
					new Promise((resolve) => {
						release = resolve;
					}),
			);

			const pending = service.generatePreviews(session.id, { count: 1 });
			await service.deleteSession(session.id);
			release({ mimeType: 'image/png', data: 'late' });

			await expect(pending).rejects.toThrow(new NotFoundException(NotFoundMessage.SESSION_NOT_FOUND));
			expect(() => service.getSession(session.id)).toThrow(NotFoundException);
			expect(files.removeImages).toHaveBeenLastCalledWith(['/srv/uploads/late.png']);
		});
	});

	describe('selectPreview and runTryOn', () => {
		const withPreviews = async () => {
			const session = await createTeeSession();
			gemini.generateImage.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p0' });
			gemini.generateImage.mockResolvedValueOnce({ mimeType: 'image/png', data: 'p1' });
			await service.generatePreviews(session.id, { count: 2 });
			return session.id;
		};

		it('rejects an index out of range', async () => {
			const id = await withPreviews();

			await expect(service.selectPreview(id, 2)).rejects.toThrow(StudioMessage.PREVIEW_INDEX_OUT_OF_RANGE);
			expect((await service.selectPreview(id, 1)).session.selected_preview).toBe(1);
		});

		it('requires a selected preview', async () => {
			const id = await withPreviews();

			await expect(service.runTryOn(id)).rejects.toThrow(new BadRequestException(StudioMessage.NO_PREVIEW_SELECTED));
			expect(gemini.composeTryOn).not.toHaveBeenCalled();
		});

		it('rejects categories without try-on', async () => {
			const id = await withPreviews();
			await service.selectPreview(id, 0);
			service.setCategory(id, GarmentCategory.HEADWEAR);

			await expect(service.runTryOn(id)).rejects.toThrow(`${StudioMessage.TRYON_NOT_SUPPORTED}: headwear`);
		});

		it('composites the product onto the selected preview', async () => {
			const id = await withPreviews();
			await service.selectPreview(id, 1);
			gemini.composeTryOn.mockResolvedValue({ mimeType: 'image/png', data: 'final' });

			const response = await service.runTryOn(id);

			expect(files.preprocessGarment).toHaveBeenCalledWith('/srv/uploads/product.png');
			expect(gemini.composeTryOn).toHaveBeenCalledWith({
				personImage: '/srv/uploads/p1.png',
				garmentImage: '/srv/uploads/garment.png',
				garmentDescription: 't-shirt, blue',
				category: GarmentCategory.UPPER_BODY,
			});
			expect(response.session.final_image_url).toBe('/uploads/final.png');
			expect(files.removeImages).toHaveBeenLastCalledWith(['/srv/uploads/garment.png']);

			await service.selectPreview(id, 0);
			expect(service.getSession(id).session.final_image_url).toBeNull();
			expect(files.removeImages).toHaveBeenLastCalledWith(['/srv/uploads/final.png']);
		});

		it('maps a provider failure to 502', async () => {
			const id = await withPreviews();
			await service.selectPreview(id, 0);
			gemini.composeTryOn.mockRejectedValue(new Error('Gemini error: boom'));

			await expect(service.runTryOn(id)).rejects.toThrow(
				new BadGatewayException(`${StudioMessage.TRYON_FAILED}: Gemini error: boom`),
			);
			expect(service.getSession(id).session.final_image_url).toBeNull();
			expect(files.removeImages).toHaveBeenLastCalledWith(['/srv/uploads/garment.png']);
		});
	});

	describe('catalog', () => {
		it('lists the base categories', () => {
			expect(service.listCategories()).toEqual([
				{ category: GarmentCategory.UPPER_BODY, tryon_supported: true, has_template: true },
				{ category: GarmentCategory.LOWER_BODY, tryon_supported: true, has_template: true },
				{ category: GarmentCategory.DRESSES, tryon_supported: true, has_template: true },
				{ category: GarmentCategory.FOOTWEAR, tryon_supported: false, has_template: true },
				{ category: GarmentCategory.HEADWEAR, tryon_supported: false, has_template: true },
			]);
		});

		it('opens every category when extended try-on is enabled', async () => {
			await setup({ sessionTtlMinutes: 60, extendedTryonCategories: true });

			const categories = service.listCategories();
			expect(categories).toHaveLength(6);
			expect(categories.every((info) => info.tryon_supported)).toBe(true);
			expect(categories[5]).toEqual({ category: GarmentCategory.ACCESSORIES, tryon_supported: true, has_template: false });
		});

		it('previews a prompt without calling any model', () => {
			const response = service.buildPromptPreview({ tags: ['Skirt', 'black'], category: 'lower_body', view_hint: 'back view' });

			expect(response.canonical_tags).toEqual(['skirt', 'black']);
			expect(response.garment_description).toBe('skirt, black');
			expect(response.prompt.positive).toContain('focus on pants and legs, back view, plain neutral fitted pants');
			expect(gemini.generateImage).not.toHaveBeenCalled();
		});
	});
});
