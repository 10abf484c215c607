import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GeminiService } from './ai/gemini.service';
import { ClaudeService } from './ai/claude.service';
import { HuggingFaceService } from './ai/huggingface.service';

@Controller()
export class AppController {
	constructor(
		private readonly configService: ConfigService,
		private readonly geminiService: GeminiService,
		private readonly claudeService: ClaudeService,
		private readonly huggingFaceService: HuggingFaceService,
	) { }

	/**
	 * Health check
	 * GET /api
	 */
	@Get()
	health() {
		return {
			status: 'ok',
			environment: this.configService.get<string>('app.nodeEnv'),
			timestamp: new Date().toISOString(),
			providers: {
				gemini: { ...this.geminiService.getApiKeyStatus(), model: this.geminiService.getModel() },
				claude: { ...this.claudeService.getApiKeyStatus(), model: this.claudeService.getModel() },
				huggingface: this.huggingFaceService.getApiKeyStatus(),
			},
		};
	}
}
