export enum ValidationMessage {
	FIELD_REQUIRED = 'This field is required',
	FIELD_INVALID = 'This field has an invalid value',
}

export enum FileMessage {
	FILE_NOT_FOUND = 'File not found',
	FILE_UPLOAD_FAILED = 'File upload failed',
	FILE_TYPE_NOT_ALLOWED = 'Only PNG, JPG and WebP images are allowed',
}

export enum NotFoundMessage {
	SESSION_NOT_FOUND = 'Studio session not found or expired',
}

export enum StudioMessage {
	NO_PREVIEW_SELECTED = 'Select a model preview before running try-on',
	PREVIEW_INDEX_OUT_OF_RANGE = 'Preview index is out of range',
	TRYON_NOT_SUPPORTED = 'Virtual try-on is not available for this category',
	NO_PREVIEWS_GENERATED = 'Preview generation returned no images',
	TRYON_FAILED = 'Failed to generate the final try-on',
}

export enum AIMessage {
	API_KEY_MISSING = 'AI provider API key is not configured',
	GEMINI_API_ERROR = 'Gemini API request failed',
	CLAUDE_API_ERROR = 'Claude API request failed',
}
