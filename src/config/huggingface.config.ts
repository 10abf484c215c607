import { registerAs } from '@nestjs/config';

export type HuggingFaceConfig = {
	apiToken: string;
	model: string;
	baseUrl: string;
	timeoutMs: number;
};

export default registerAs('huggingface', (): HuggingFaceConfig => ({
	apiToken: process.env.HF_API_TOKEN || '',
	model: process.env.HF_CLASSIFIER_MODEL || 'google/vit-base-patch16-224',
	baseUrl: (process.env.HF_API_BASE_URL || 'https://api-inference.huggingface.co/models').replace(/\/$/, ''),
	timeoutMs: parseInt(process.env.HF_TIMEOUT_MS || '30000', 10),
}));
