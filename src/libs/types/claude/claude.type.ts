export type ClaudeImageMediaType = 'image/jpeg' | 'image/png' | 'image/webp' | 'image/gif';

export type ClaudeImageSource = {
    data: string;
    mediaType: ClaudeImageMediaType;
};

export type ClaudeContentBlock =
    | { type: 'text'; text: string }
    | {
        type: 'image';
        source: { type: 'base64'; media_type: ClaudeImageMediaType; data: string };
    };
