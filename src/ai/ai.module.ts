import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ClaudeService } from './claude.service';
import { GeminiService } from './gemini.service';
import { HuggingFaceService } from './huggingface.service';
import { PromptBuilderService } from './prompt-builder.service';
import { CategoryClassifierService } from './category-classifier.service';

@Module({
	imports: [ConfigModule],
	providers: [ClaudeService, GeminiService, HuggingFaceService, PromptBuilderService, CategoryClassifierService],
	exports: [ClaudeService, GeminiService, HuggingFaceService, PromptBuilderService, CategoryClassifierService],
})
export class AiModule { }
