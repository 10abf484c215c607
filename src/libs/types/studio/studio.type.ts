import { GarmentCategory } from '../../enums';
import { ViewHint } from '../../config';
import { CanonicalTag, CategorySource, PromptPair } from '../../../common/interfaces/garment.interface';
import { ServiceErrorKind } from '../result/result.type';
import { StoredImage } from '../../../files/files.service';
import { CategoryProvider } from '../../../ai/category-classifier.service';

export type TaggingStatus =
	| { status: 'ok'; tag_count: number }
	| { status: 'empty' }
	| { status: 'failed'; kind: ServiceErrorKind; message: string };

export type ClassifierStatus =
	| { status: 'ok'; provider: CategoryProvider; answer: string; accepted: boolean }
	| { status: 'skipped' }
	| { status: 'failed'; kind: ServiceErrorKind; message: string };

export interface PreviewImage {
	index: number;
	view: ViewHint;
	url: string;
	path: string;
	prompt: PromptPair;
}

export interface StudioSession {
	id: string;
	product: StoredImage;
	raw_tags: string[];
	canonical_tags: CanonicalTag[];
	garment_description: string;
	tagging: TaggingStatus;
	classifier: ClassifierStatus;
	detected_category: GarmentCategory;
	category_source: CategorySource;
	category: GarmentCategory;
	gender: string | null;
	previews: PreviewImage[];
	selected_preview: number | null;
	final_image: StoredImage | null;
	created_at: Date;
	updated_at: Date;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESPONSE INTERFACES
// ═══════════════════════════════════════════════════════════════════════════

export interface StudioSessionView {
	id: string;
	product_image_url: string;
	raw_tags: string[];
	canonical_tags: CanonicalTag[];
	garment_description: string;
	tagging: TaggingStatus;
	classifier: ClassifierStatus;
	detected_category: GarmentCategory;
	category_source: CategorySource;
	category: GarmentCategory;
	tryon_supported: boolean;
	previews: Array<{ index: number; view: ViewHint; url: string }>;
	selected_preview: number | null;
	final_image_url: string | null;
	created_at: string;
	updated_at: string;
}

export interface StudioSessionResponse {
	success: boolean;
	session: StudioSessionView;
	message?: string;
	warning?: string;
	next_step?: string;
}

export interface PreviewGenerationResponse extends StudioSessionResponse {
	requested: number;
	generated: number;
}

export interface CategoryInfo {
	category: GarmentCategory;
	tryon_supported: boolean;
	has_template: boolean;
}

export interface PromptPreviewResponse {
	success: boolean;
	canonical_tags: CanonicalTag[];
	garment_description: string;
	category: string;
	prompt: PromptPair;
}
