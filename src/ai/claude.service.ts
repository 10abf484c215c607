import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic from '@anthropic-ai/sdk';
import type { Messages } from '@anthropic-ai/sdk/resources';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import * as path from 'path';
import sharp from 'sharp';
import { AIMessage } from '../libs/enums';
import { CATEGORY_CLASSIFICATION_PROMPT } from './prompts/category-classification.prompt';
import { ClaudeContentBlock, ClaudeImageMediaType, ClaudeImageSource } from '../libs/types/claude/claude.type';
import { ServiceResult, failure, success } from '../libs/types/result/result.type';

const MAX_IMAGE_BYTES = 5 * 1024 * 1024; // Claude rejects images above 5MB
const TARGET_IMAGE_BYTES = 4.5 * 1024 * 1024;

@Injectable()
export class ClaudeService {
    private readonly logger = new Logger(ClaudeService.name);

    private client: Anthropic | null = null;

    private readonly model: string;

    constructor(private readonly configService: ConfigService) {
        this.model = this.configService.get<string>('claude.model') || 'claude-3-5-sonnet-20240620';
    }

    isConfigured(): boolean {
        return !!this.configService.get<string>('claude.apiKey');
    }

    /**
     * Ask Claude which garment category the product image shows.
     * Returns the raw text answer.
     */
    async classifyCategory(image: string): Promise<ServiceResult<string>> {
        if (!this.isConfigured()) {
            return failure('not_configured', AIMessage.API_KEY_MISSING);
        }

        let source: ClaudeImageSource;
        try {
            source = await this.readLocalImage(image);
        } catch (error: unknown) {
            return failure('rejected', error instanceof Error ? error.message : String(error));
        }

        const content: ClaudeContentBlock[] = [
            { type: 'text', text: CATEGORY_CLASSIFICATION_PROMPT },
            { type: 'image', source: { type: 'base64', media_type: source.mediaType, data: source.data } },
        ];

        try {
            const response = await this.createMessage({ content, max_tokens: 20 });
            const text = this.extractText(response.content);
            if (!text) {
                return failure('invalid_response', 'Claude returned no text');
            }

            this.logger.log(`🔍 Claude category answer: "${text}"`);
            return success(text);
        } catch (error: unknown) {
            return failure('unavailable', error instanceof Error ? error.message : String(error));
        }
    }

    private getClient(): Anthropic {
        if (this.client) {
            return this.client;
        }

        const apiKey = this.configService.get<string>('claude.apiKey');

        if (!apiKey) {
            this.logger.error('ANTHROPIC_API_KEY is not set in environment variables');
            throw new InternalServerErrorException(AIMessage.API_KEY_MISSING);
        }

        this.client = new Anthropic({ apiKey });
        return this.client;
    }

    /**
     * Get current API key status (masked for security)
     */
    getApiKeyStatus(): { hasSystemKey: boolean; systemKeyMasked: string | null } {
        const apiKey = this.configService.get<string>('claude.apiKey');
        return {
            hasSystemKey: !!apiKey,
            systemKeyMasked: apiKey ? `${apiKey.substring(0, 10)}****${apiKey.substring(apiKey.length - 4)}` : null,
        };
    }

    getModel(): string {
        return this.model;
    }

    private async createMessage(params: {
        content: ClaudeContentBlock[];
        max_tokens: number;
    }): Promise<Messages.Message> {
        const maxRetries = 3;
        const baseDelay = 2000;

        for (let attempt = 0; attempt < maxRetries; attempt++) {
            try {
                return await this.getClient().messages.create({
                    model: this.model,
                    max_tokens: params.max_tokens,
                    messages: [
                        {
                            role: 'user',
                            content: params.content,
                        },
                    ],
                });
            } catch (error: unknown) {
                const status = error instanceof Anthropic.APIError ? error.status : undefined;
                const isOverloaded = status === 529 || status === 503 || status === 429;
                const message = error instanceof Error ? error.message : String(error);

                this.logger.warn(`Claude API attempt ${attempt + 1}/${maxRetries} failed (status ${status ?? 'n/a'}): ${message}`);

                if (isOverloaded && attempt < maxRetries - 1) {
                    const delay = baseDelay * Math.pow(2, attempt); // 2s, 4s
                    this.logger.log(`⏳ Claude API overloaded (${status}), retrying in ${delay}ms...`);
                    await new Promise(resolve => setTimeout(resolve, delay));
                    continue;
                }

                throw new InternalServerErrorException(AIMessage.CLAUDE_API_ERROR);
            }
        }

        throw new InternalServerErrorException(AIMessage.CLAUDE_API_ERROR);
    }

    private async readLocalImage(imagePath: string): Promise<ClaudeImageSource> {
        const candidates: string[] = [];

        if (path.isAbsolute(imagePath)) {
            candidates.push(imagePath);
        }

        candidates.push(path.join(process.cwd(), imagePath.replace(/^\/+/, '')));

        const existing = candidates.find((candidate) => existsSync(candidate));

        if (!existing) {
            throw new Error(`Local image not found: ${imagePath}`);
        }

        const buffer = await readFile(existing);
        return this.compressImageIfNeeded(buffer, detectImageFormat(buffer));
    }

    private async compressImageIfNeeded(buffer: Buffer, mediaType: ClaudeImageMediaType): Promise<ClaudeImageSource> {
        if (buffer.length <= MAX_IMAGE_BYTES) {
            return { data: buffer.toString('base64'), mediaType };
        }

        this.logger.warn(`🗜️ Image size (${(buffer.length / 1024 / 1024).toFixed(2)}MB) exceeds Claude limit (5MB), compressing...`);

        let quality = 85;
        let maxDimension = 2048;
        let compressed = buffer;

        for (let attempt = 0; attempt < 5; attempt++) {
            compressed = await sharp(buffer)
                .resize(maxDimension, maxDimension, { fit: 'inside', withoutEnlargement: true })
                .jpeg({ quality, progressive: true })
                .toBuffer();

            if (compressed.length <= TARGET_IMAGE_BYTES) {
                break;
            }

            quality = Math.max(60, quality - 10);
            maxDimension = Math.max(1024, maxDimension - 256);
        }

        this.logger.log(`Compressed image to ${(compressed.length / 1024 / 1024).toFixed(2)}MB`);
        return { data: compressed.toString('base64'), mediaType: 'image/jpeg' };
    }

    private extractText(content: Array<{ type: string; text?: string }>): string {
        return content
            .map((block) => (block.type === 'text' && block.text ? block.text : ''))
            .join('')
            .trim();
    }
}

/** Detect the image format from its magic bytes */
export function detectImageFormat(buffer: Buffer): ClaudeImageMediaType {
    if (buffer.length < 4) {
        return 'image/jpeg';
    }

    // PNG: 89 50 4E 47
    if (buffer[0] === 0x89 && buffer[1] === 0x50 && buffer[2] === 0x4e && buffer[3] === 0x47) {
        return 'image/png';
    }

    // GIF8
    if (buffer[0] === 0x47 && buffer[1] === 0x49 && buffer[2] === 0x46 && buffer[3] === 0x38) {
        return 'image/gif';
    }

    // RIFF....WEBP
    if (
        buffer.length >= 12 &&
        buffer.subarray(0, 4).toString() === 'RIFF' &&
        buffer.subarray(8, 12).toString() === 'WEBP'
    ) {
        return 'image/webp';
    }

    return 'image/jpeg';
}
