// Session DTOs
export * from './create/create-session.dto';
export * from './update/update-category.dto';

// Generation DTOs
export * from './generate-previews.dto';
export * from './select-preview.dto';

// Prompt DTOs
export * from './build-prompt.dto';
