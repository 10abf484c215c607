// Image model used for preview generation and try-on compositing
export const GEMINI_MODEL = process.env.GEMINI_MODEL || 'gemini-3-pro-image-preview';

// Multimodal model used for category classification
export const GEMINI_ANALYSIS_MODEL = process.env.GEMINI_ANALYSIS_MODEL || 'gemini-2.0-flash';

// Image generation result type
export type GeminiImageResult = {
	mimeType: string;  // 'image/png' or 'image/jpeg'
	data?: string;     // base64 encoded image data
	text?: string;     // Optional text response
};

// Valid aspect ratios for Gemini image generation
export const VALID_ASPECT_RATIOS = [
	'1:1', '2:3', '3:2', '3:4', '4:3', '4:5', '5:4', '9:16', '16:9', '21:9'
] as const;

// Valid image sizes for Gemini 3 Pro Image Preview
export const VALID_IMAGE_SIZES = ['1K', '2K', '4K'] as const;

// Camera angles cycled across a batch of generated previews
export const VIEW_ROTATION = ['front view', 'left three-quarter view', 'right three-quarter view'] as const;

export type ViewHint = (typeof VIEW_ROTATION)[number];

export const DEFAULT_PREVIEW_COUNT = 3;
export const MAX_PREVIEW_COUNT = 6;

export const HF_TOP_K = 10;

// Longest side of the garment image sent to compositing
export const GARMENT_MAX_DIMENSION = 768;

export const FILE_SIZE_LIMIT = { fileSize: 30 * 1024 * 1024 }; // 30MB

export const ALLOWED_IMAGE_MIME_TYPES = ['image/png', 'image/jpeg', 'image/webp'];
