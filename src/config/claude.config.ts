import { registerAs } from '@nestjs/config';

export default registerAs('claude', () => ({
	apiKey: process.env.ANTHROPIC_API_KEY || '',
	model: process.env.CLAUDE_MODEL || 'claude-3-5-sonnet-20240620',
}));
