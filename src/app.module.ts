// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import appConfig from './config/app.config';
import uploadConfig from './config/upload.config';
import geminiConfig from './config/gemini.config';
import huggingfaceConfig from './config/huggingface.config';
import claudeConfig from './config/claude.config';
import studioConfig from './config/studio.config';
import { FilesModule } from './files/files.module';
import { AiModule } from './ai/ai.module';
import { StudioModule } from './studio/studio.module';
import { AppController } from './app.controller';

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			load: [appConfig, uploadConfig, geminiConfig, huggingfaceConfig, claudeConfig, studioConfig],
		}),

		FilesModule,
		AiModule,
		StudioModule,
	],
	controllers: [AppController],
})
export class AppModule {}
