/**
 * Small text helpers shared by the tone classifier and the prosody rewriter.
 */

const SENTENCE_BREAK = /(?<=[.?!…])\s+/;

/** Collapses every whitespace run to one space and trims the ends. */
export const normalizeWhitespace = (text: string): string =>
	text.replace(/\s+/g, ' ').trim();

/**
 * Splits text into sentences after terminal punctuation followed by
 * whitespace. Punctuation stays attached to its sentence.
 */
export const splitSentences = (text: string): string[] => {
	const normalized = normalizeWhitespace(text);
	if (!normalized) return [];
	return normalized.split(SENTENCE_BREAK).filter((sentence) => sentence.length > 0);
};

/** Lower-cases and folds typographic apostrophes so rules only list `'`. */
export const foldForMatching = (text: string): string =>
	normalizeWhitespace(text).toLowerCase().replace(/[‘’ʼ]/g, '\'');

const isWordChar = (char: string | undefined): boolean =>
	char !== undefined && /[\p{L}\p{N}']/u.test(char);

/**
 * True when `phrase` occurs in `text` without being glued to a longer word,
 * so "lol" matches "lol, ok" but not "lollipop".
 */
export const containsPhrase = (text: string, phrase: string): boolean => {
	let from = 0;
	while (from <= text.length - phrase.length) {
		const index = text.indexOf(phrase, from);
		if (index === -1) return false;
		if (!isWordChar(text[index - 1]) && !isWordChar(text[index + phrase.length]))
			return true;
		from = index + 1;
	};
	return false;
};

/** Word tokens in order, ignoring punctuation and layout. */
export const wordTokens = (text: string): string[] =>
	text.match(/[\p{L}\p{N}'’]+/gu) ?? [];
