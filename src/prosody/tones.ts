/**
 * Tone labels assigned to assistant replies. Each one picks a speaking
 * style for synthesis and a reaction clip for the avatar.
 */
export const TONE_LABELS = [
	'sympathetic',
	'bummed',
	'reassuring',
	'encouraging',
	'happy',
	'playful',
	'intrigued',
	'caution',
	'excited',
	'neutral'
] as const;

export type ToneLabel = typeof TONE_LABELS[number];

export const isToneLabel = (value: unknown): value is ToneLabel =>
	TONE_LABELS.some((label) => label === value);

/** Tones that get the slow, one-sentence-per-line treatment. */
export const SOFT_TONES: ReadonlySet<ToneLabel> = new Set(['sympathetic', 'bummed']);

/** Tones that keep momentum and end on a lift. */
export const UPBEAT_TONES: ReadonlySet<ToneLabel> = new Set([
	'encouraging',
	'happy',
	'reassuring',
	'playful',
	'excited'
]);
