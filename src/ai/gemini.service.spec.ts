import { BadRequestException, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GarmentCategory } from '../libs/enums';
import { GeminiService } from './gemini.service';

const mockGenerateContent = jest.fn();

jest.mock('@google/genai', () => ({
	GoogleGenAI: jest.fn().mockImplementation(() => ({ models: { generateContent: mockGenerateContent } })),
	HarmCategory: {
		HARM_CATEGORY_HARASSMENT: 'HARM_CATEGORY_HARASSMENT',
		HARM_CATEGORY_HATE_SPEECH: 'HARM_CATEGORY_HATE_SPEECH',
		HARM_CATEGORY_SEXUALLY_EXPLICIT: 'HARM_CATEGORY_SEXUALLY_EXPLICIT',
		HARM_CATEGORY_DANGEROUS_CONTENT: 'HARM_CATEGORY_DANGEROUS_CONTENT',
	},
	HarmBlockThreshold: { BLOCK_NONE: 'BLOCK_NONE' },
}));

const PERSON = 'data:image/png;base64,cGVyc29u';
const GARMENT = 'data:image/png;base64,Z2FybWVudA==';

function imageResponse(data: string, mimeType = 'image/png') {
	return { candidates: [{ content: { parts: [{ inlineData: { mimeType, data } }] } }] };
}

function textResponse(text: string) {
	return { candidates: [{ content: { parts: [{ text }] } }] };
}

describe('GeminiService', () => {
	const pair = { positive: 'photo of a male fashion model', negative: 'text, watermark' };

	const createService = (apiKey = 'test-secret') => new GeminiService(new ConfigService({ gemini: { apiKey } }));

	beforeEach(() => {
		mockGenerateContent.mockReset();
	});

	describe('generateImage', () => {
		it('sends the negative prompt as an Avoid line and returns the image', async () => {
			mockGenerateContent.mockResolvedValue(imageResponse('aW1hZ2U='));

			const result = await createService().generateImage(pair);

			expect(result).toEqual({ mimeType: 'image/png', data: 'aW1hZ2U=' });
			const request = mockGenerateContent.mock.calls[0][0];
			expect(request.contents[0].parts).toEqual([{ text: 'photo of a male fashion model.\nAvoid: text, watermark.' }]);
			expect(request.config.responseModalities).toEqual(['TEXT', 'IMAGE']);
			expect(request.config.imageConfig).toEqual({ aspectRatio: '3:4', imageSize: '1K' });
		});

		it('passes aspect ratio and resolution through', async () => {
			mockGenerateContent.mockResolvedValue(imageResponse('aW1hZ2U='));

			await createService().generateImage(pair, '16:9', '2k');

			expect(mockGenerateContent.mock.calls[0][0].config.imageConfig).toEqual({ aspectRatio: '16:9', imageSize: '2K' });
		});

		it('does not retry a refusal', async () => {
			mockGenerateContent.mockResolvedValue(textResponse('I cannot generate that image.'));

			await expect(createService().generateImage(pair)).rejects.toThrow(InternalServerErrorException);
			expect(mockGenerateContent).toHaveBeenCalledTimes(1);
		});

		it('does not retry a safety block', async () => {
			mockGenerateContent.mockResolvedValue({ candidates: [{ finishReason: 'IMAGE_SAFETY', content: { parts: [] } }] });

			await expect(createService().generateImage(pair)).rejects.toThrow(
				'Image generation was blocked by platform safety policy',
			);
			expect(mockGenerateContent).toHaveBeenCalledTimes(1);
		});

		it('retries a transient failure once', async () => {
			jest.useFakeTimers();
			try {
				mockGenerateContent
					.mockRejectedValueOnce(new Error('socket hang up'))
					.mockResolvedValueOnce(imageResponse('c2Vjb25k'));

				const pending = createService().generateImage(pair);
				await jest.advanceTimersByTimeAsync(3000);

				await expect(pending).resolves.toEqual({ mimeType: 'image/png', data: 'c2Vjb25k' });
				expect(mockGenerateContent).toHaveBeenCalledTimes(2);
			} finally {
				jest.useRealTimers();
			}
		});

		it('rejects an empty prompt', async () => {
			await expect(createService().generateImage({ positive: '', negative: '' })).rejects.toThrow('Prompt string is required');
		});
	});

	describe('composeTryOn', () => {
		it('sends the instruction, then the person image, then the garment image', async () => {
			mockGenerateContent.mockResolvedValue(imageResponse('ZmluYWw=', 'image/jpeg'));

			const result = await createService().composeTryOn({
				personImage: PERSON,
				garmentImage: GARMENT,
				garmentDescription: 't-shirt, blue',
				category: GarmentCategory.UPPER_BODY,
			});

			expect(result).toEqual({ mimeType: 'image/jpeg', data: 'ZmluYWw=' });
			const parts = mockGenerateContent.mock.calls[0][0].contents[0].parts;
			expect(parts).toHaveLength(3);
			expect(parts[0].text).toContain('product photo of a garment (t-shirt, blue)');
			expect(parts[0].text).toContain('Replace only the top the model is wearing.');
			expect(parts[1]).toEqual({ inlineData: { mimeType: 'image/png', data: 'cGVyc29u' } });
			expect(parts[2]).toEqual({ inlineData: { mimeType: 'image/png', data: 'Z2FybWVudA==' } });
		});

		it('fails when one of the images cannot be loaded', async () => {
			await expect(
				createService().composeTryOn({
					personImage: PERSON,
					garmentImage: '/missing/garment.png',
					garmentDescription: 'dress',
					category: GarmentCategory.DRESSES,
				}),
			).rejects.toThrow(BadRequestException);
			expect(mockGenerateContent).not.toHaveBeenCalled();
		});
	});

	describe('classifyCategory', () => {
		it('returns the trimmed answer', async () => {
			mockGenerateContent.mockResolvedValue(textResponse('  Dress.\n'));

			expect(await createService().classifyCategory(GARMENT)).toEqual({ ok: true, value: 'Dress.' });
		});

		it('reports an empty answer as invalid_response', async () => {
			mockGenerateContent.mockResolvedValue(textResponse('   '));

			expect(await createService().classifyCategory(GARMENT)).toEqual({
				ok: false,
				kind: 'invalid_response',
				message: 'Gemini returned no text',
			});
		});

		it('reports SDK errors as unavailable', async () => {
			mockGenerateContent.mockRejectedValue(new Error('503 Service Unavailable'));

			expect(await createService().classifyCategory(GARMENT)).toEqual({
				ok: false,
				kind: 'unavailable',
				message: '503 Service Unavailable',
			});
		});

		it('reports a missing key as not_configured', async () => {
			const result = await createService('').classifyCategory(GARMENT);

			expect(result).toEqual({ ok: false, kind: 'not_configured', message: 'AI provider API key is not configured' });
			expect(mockGenerateContent).not.toHaveBeenCalled();
		});
	});

	it('masks the API key', () => {
		expect(createService('test-secret-key-1234').getApiKeyStatus()).toEqual({
			hasSystemKey: true,
			systemKeyMasked: 'test-secre****1234',
		});
	});
});
