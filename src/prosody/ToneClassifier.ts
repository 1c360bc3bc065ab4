import * as fs from 'fs';
import { z } from 'zod';
import { TONE_LABELS, type ToneLabel } from './tones.ts';
import { containsPhrase, foldForMatching, splitSentences } from './text.ts';

const CUES = ['exclamation'] as const;
type Cue = typeof CUES[number];

const PhraseRuleSchema = z.object({
	tone: z.enum(TONE_LABELS),
	phrases: z.array(z.string().min(1)).min(1)
});

const CueRuleSchema = z.object({
	tone: z.enum(TONE_LABELS),
	cue: z.enum(CUES)
});

const RuleFileSchema = z.object({
	rules: z.array(z.union([PhraseRuleSchema, CueRuleSchema]))
});

export type ToneRuleDefinition = z.infer<typeof PhraseRuleSchema> | z.infer<typeof CueRuleSchema>;

/**
 * One row of the ordered rule table. `matches` receives the folded
 * (lower-cased, apostrophe-normalized) text and the raw text.
 */
export interface ToneRule {
	name: string;
	tone: ToneLabel;
	matches: (folded: string, raw: string) => boolean;
}

export interface ToneDecision {
	tone: ToneLabel;
	/** Name of the rule that fired, or null when the fallback applied. */
	rule: string | null;
}

const cueMatchers: Record<Cue, (raw: string) => boolean> = {
	// At least two exclamation marks and one for every two sentences.
	exclamation: (raw) => {
		const marks = raw.split('!').length - 1;
		if (marks < 2) return false;
		const sentences = Math.max(1, splitSentences(raw).length);
		return marks / sentences >= 0.5;
	}
};

export const compileToneRules = (definitions: readonly ToneRuleDefinition[]): ToneRule[] =>
	definitions.map((definition, index) => {
		if ('cue' in definition) {
			const matcher = cueMatchers[definition.cue];
			return {
				name: `${index}:${definition.tone}:${definition.cue}`,
				tone: definition.tone,
				matches: (_folded: string, raw: string) => matcher(raw)
			};
		};

		const phrases = definition.phrases.map(foldForMatching);
		return {
			name: `${index}:${definition.tone}`,
			tone: definition.tone,
			matches: (folded: string) => phrases.some((phrase) => containsPhrase(folded, phrase))
		};
	});

/**
 * Reads and validates a rule table from a JSON file of the form
 * `{ "rules": [{ "tone", "phrases" } | { "tone", "cue" }] }`.
 */
export const loadToneRules = (source: URL | string): ToneRule[] => {
	const raw: unknown = JSON.parse(fs.readFileSync(source, 'utf-8'));
	const parsed = RuleFileSchema.parse(raw);
	return compileToneRules(parsed.rules);
};

/**
 * Assigns exactly one tone label to a reply by walking the rule table in
 * order. The first rule that matches wins; no match means neutral.
 */
export class ToneClassifier {
	private readonly rules: readonly ToneRule[];

	constructor(rules: readonly ToneRule[]) {
		this.rules = rules;
	};

	public explain(text: string): ToneDecision {
		const folded = foldForMatching(text);
		if (!folded) return { tone: 'neutral', rule: null };

		for (const rule of this.rules)
			if (rule.matches(folded, text))
				return { tone: rule.tone, rule: rule.name };

		return { tone: 'neutral', rule: null };
	};

	public detect(text: string): ToneLabel {
		return this.explain(text).tone;
	};
};

export const defaultToneClassifier = new ToneClassifier(
	loadToneRules(new URL('./tone-rules.json', import.meta.url))
);

export const detectTone = (text: string): ToneLabel => defaultToneClassifier.detect(text);
