import { registerAs } from '@nestjs/config';

export default registerAs('gemini', () => ({
	apiKey: process.env.GEMINI_API_KEY || '',
}));
