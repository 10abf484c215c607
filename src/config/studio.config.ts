import { registerAs } from '@nestjs/config';

export type StudioConfig = {
	sessionTtlMinutes: number;
	/** Offer compositing for footwear, headwear and accessories too */
	extendedTryonCategories: boolean;
};

export default registerAs('studio', (): StudioConfig => ({
	sessionTtlMinutes: parseInt(process.env.SESSION_TTL_MINUTES || '60', 10),
	extendedTryonCategories: (process.env.TRYON_EXTENDED_CATEGORIES || 'false').toLowerCase() === 'true',
}));
