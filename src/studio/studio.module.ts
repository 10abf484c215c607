import { Module } from '@nestjs/common';
import { StudioController } from './studio.controller';
import { StudioService } from './studio.service';
import { StudioSessionStore } from './studio-session.store';
import { FilesModule } from '../files/files.module';
import { AiModule } from '../ai/ai.module';

@Module({
	imports: [FilesModule, AiModule],
	controllers: [StudioController],
	providers: [StudioService, StudioSessionStore],
	exports: [StudioService],
})
export class StudioModule {}
