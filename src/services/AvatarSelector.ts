import { isToneLabel, type ToneLabel } from '../prosody/tones.ts';

export const VIDEO_ROUTE = '/video';

/**
 * Picks the pre-recorded reaction clip for a tone. Anything that is not a
 * known tone label plays the neutral clip.
 */
export class AvatarSelector {
	private extension: string;

	constructor(extension: string = 'mp4') {
		this.extension = extension;
	};

	public select(tone: string): string {
		const label: ToneLabel = isToneLabel(tone) ? tone : 'neutral';
		return `${label}.${this.extension}`;
	};

	public url(tone: string): string {
		return `${VIDEO_ROUTE}/${this.select(tone)}`;
	};
};
