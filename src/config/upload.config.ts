import { registerAs } from '@nestjs/config';

export type UploadConfig = {
	provider: 'local';
	localPath: string;
	baseUrl: string;
};

export default registerAs('upload', (): UploadConfig => ({
	provider: 'local',
	localPath: (process.env.UPLOAD_LOCAL_PATH || 'uploads').replace(/^\/+|\/+$/g, ''),
	baseUrl: process.env.UPLOAD_BASE_URL || '',
}));
