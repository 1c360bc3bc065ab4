import { SOFT_TONES, UPBEAT_TONES, type ToneLabel } from './tones.ts';
import { splitSentences } from './text.ts';

/**
 * Shaped text plus the speaking style the synthesizer should use for it.
 * Built per request and thrown away once the audio exists.
 */
export interface ProsodyDirective {
	tone: ToneLabel;
	delivery: string;
	text: string;
}

const UPBEAT_LINE_LENGTH = 80;
const NEUTRAL_LINE_LENGTH = 100;
const LONG_SENTENCE_LENGTH = 120;

const SOFT_WORDS = /\b(sorry|hard|tough|understand|alone|worried)\b/i;
const LEADING_NAME = /^([A-Z][a-z]{1,20}), *(.+)$/;
const TRAILING_ELLIPSIS = /(\.\.\.|…)$/;

export const DELIVERY: Record<ToneLabel, string> = {
	sympathetic: 'Speak softly and slowly, with warmth and empathy',
	bummed: 'Speak gently, sounding a little deflated but kind',
	reassuring: 'Speak in a calm and steady voice',
	encouraging: 'Speak warmly and with quiet confidence',
	happy: 'Speak cheerfully, with a smile in your voice',
	playful: 'Speak playfully, with light humour',
	intrigued: 'Speak with curiosity and interest',
	caution: 'Speak clearly and deliberately, with gentle concern',
	excited: 'Speak with bright, high-energy excitement',
	neutral: 'Speak in a natural, friendly conversational tone'
};

// "Sam, I'm sorry." -> "Sam... I'm sorry."
const softenLeadingName = (sentences: string[]): string[] => {
	const [first, ...rest] = sentences;
	if (first === undefined) return sentences;
	const match = LEADING_NAME.exec(first);
	if (!match) return sentences;
	return [`${match[1]}... ${match[2]}`, ...rest];
};

const trailOff = (sentence: string): string => {
	if (TRAILING_ELLIPSIS.test(sentence) || /[?!]$/.test(sentence)) return sentence;
	if (sentence.endsWith('.')) return sentence.slice(0, -1) + '...';
	return sentence + '...';
};

const lift = (line: string, tone: ToneLabel): string => {
	if (TRAILING_ELLIPSIS.test(line) || /[?!]$/.test(line)) return line;
	const mark = tone === 'happy' || tone === 'excited' ? '!' : '...';
	if (line.endsWith('.')) return line.slice(0, -1) + mark;
	return line + mark;
};

/**
 * Packs sentences into lines no longer than `limit`; a single sentence
 * longer than the limit gets a line of its own.
 */
const groupSentences = (sentences: string[], limit: number): string[] => {
	const lines: string[] = [];
	let buffer = '';

	for (const sentence of sentences) {
		const joined = buffer ? `${buffer} ${sentence}` : sentence;
		if (buffer && joined.length > limit) {
			lines.push(buffer);
			buffer = sentence;
		} else
			buffer = joined;
	};

	if (buffer) lines.push(buffer);
	return lines;
};

/** Breaks an over-long sentence after its commas into shorter lines. */
export const splitLongSentence = (sentence: string, limit: number = LONG_SENTENCE_LENGTH): string[] => {
	if (sentence.length <= limit) return [sentence];
	const clauses = sentence.split(/(?<=,) +/);
	if (clauses.length === 1) return [sentence];
	return groupSentences(clauses, limit);
};

const render = (paragraphs: string[][]): string =>
	paragraphs
		.filter((lines) => lines.length > 0)
		.map((lines) => lines.join('\n'))
		.join('\n\n')
		.replace(/\.\.\./g, '…')
		.replace(/ +([.,!?…])/g, '$1');

/**
 * Rewrites reply text so a speech synthesizer delivers it in the given
 * tone. Only layout and punctuation change; the words and their order are
 * kept. Shaping already-shaped text may add markers again.
 */
export const shape = (text: string, tone: ToneLabel): string => {
	let sentences = splitSentences(text);
	if (sentences.length === 0) return '';

	if (tone === 'sympathetic')
		sentences = softenLeadingName(sentences);

	const paragraphs: string[][] = [];

	if (SOFT_TONES.has(tone)) {
		let current: string[] = [];
		sentences.forEach((sentence, index) => {
			current.push(SOFT_WORDS.test(sentence) ? trailOff(sentence) : sentence);
			// breathing room after every second sentence
			if (index % 2 === 1) {
				paragraphs.push(current);
				current = [];
			};
		});
		paragraphs.push(current);
	} else if (UPBEAT_TONES.has(tone)) {
		const lines = groupSentences(sentences, UPBEAT_LINE_LENGTH);
		const last = lines.length - 1;
		lines[last] = lift(lines[last] ?? '', tone);
		paragraphs.push(lines);
	} else if (tone === 'caution')
		for (const sentence of sentences)
			paragraphs.push(splitLongSentence(sentence));
	else
		paragraphs.push(
			groupSentences(sentences, NEUTRAL_LINE_LENGTH).flatMap((line) => splitLongSentence(line))
		);

	return render(paragraphs);
};

export const direct = (text: string, tone: ToneLabel): ProsodyDirective => ({
	tone,
	delivery: DELIVERY[tone],
	text: shape(text, tone)
});
