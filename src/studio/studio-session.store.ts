import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StudioConfig } from '../config/studio.config';
import { StudioSession } from '../libs/types/studio/studio.type';
import { FilesService } from '../files/files.service';

/** Every file on disk that belongs to a session */
export function sessionFiles(session: StudioSession): string[] {
	const paths = [session.product.path, ...session.previews.map((preview) => preview.path)];
	if (session.final_image) {
		paths.push(session.final_image.path);
	}
	return paths;
}

/**
 * Process-local session storage. Reads and writes refresh a session's idle clock;
 * sessions idle longer than the configured TTL are dropped, with their files,
 * the next time the store is touched.
 */
@Injectable()
export class StudioSessionStore {
	private readonly logger = new Logger(StudioSessionStore.name);
	private readonly sessions = new Map<string, StudioSession>();

	constructor(
		private readonly configService: ConfigService,
		private readonly filesService: FilesService,
	) { }

	get(id: string, now: Date = new Date()): StudioSession | null {
		this.prune(now);
		const session = this.sessions.get(id);
		if (!session) return null;

		session.updated_at = now;
		return session;
	}

	save(session: StudioSession, now: Date = new Date()): StudioSession {
		this.prune(now);
		session.updated_at = now;
		this.sessions.set(session.id, session);
		return session;
	}

	/**
	 * Refresh a session that is still stored. Returns false when it was deleted
	 * or pruned in the meantime, so callers holding a stale reference cannot bring it back.
	 */
	update(session: StudioSession, now: Date = new Date()): boolean {
		this.prune(now);
		if (this.sessions.get(session.id) !== session) {
			return false;
		}
		session.updated_at = now;
		return true;
	}

	async delete(id: string): Promise<boolean> {
		const session = this.sessions.get(id);
		if (!session) return false;

		this.sessions.delete(id);
		await this.filesService.removeImages(sessionFiles(session));
		return true;
	}

	size(): number {
		return this.sessions.size;
	}

	prune(now: Date = new Date()): number {
		const ttlMs = this.ttlMinutes() * 60 * 1000;
		const expired: string[] = [];
		let removed = 0;

		for (const [id, session] of this.sessions) {
			if (now.getTime() - session.updated_at.getTime() > ttlMs) {
				this.sessions.delete(id);
				expired.push(...sessionFiles(session));
				removed++;
			}
		}

		if (removed > 0) {
			this.logger.log(`🧹 Pruned ${removed} expired session(s)`);
			// removeImages logs its own failures and never rejects
			void this.filesService.removeImages(expired);
		}
		return removed;
	}

	private ttlMinutes(): number {
		const ttl = this.configService.get<StudioConfig>('studio')?.sessionTtlMinutes;
		return ttl && ttl > 0 ? ttl : 60;
	}
}
