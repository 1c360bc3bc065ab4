import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import {
	ToneClassifier,
	compileToneRules,
	defaultToneClassifier,
	detectTone,
	loadToneRules
} from '../ToneClassifier.ts';
import { TONE_LABELS } from '../tones.ts';

describe('detectTone', () => {
	it('returns neutral for empty input', () => {
		expect(detectTone('')).toBe('neutral');
	});

	it('returns neutral for whitespace-only input', () => {
		expect(detectTone('   ')).toBe('neutral');
		expect(detectTone('\n\t ')).toBe('neutral');
	});

	it('labels "This is amazing!!!" as excited', () => {
		expect(detectTone('This is amazing!!!')).toBe('excited');
	});

	it('falls back to neutral when no rule matches', () => {
		expect(detectTone('The train leaves at noon.')).toBe('neutral');
	});

	it.each([
		['sympathetic', 'That sounds really hard.'],
		['bummed', 'Ugh, that\'s rough.'],
		['reassuring', 'You\'re not alone in this.'],
		['encouraging', 'Keep going, you\'ve got this.'],
		['happy', 'I\'m glad you called.'],
		['playful', 'Haha, fair point.'],
		['intrigued', 'I wonder what happened next.'],
		['caution', 'Please be careful on the roads.'],
		['excited', 'I\'m so excited for you.']
	])('detects %s', (tone, text) => {
		expect(detectTone(text)).toBe(tone);
	});

	it('lets the earlier rule win when several match', () => {
		// bummed and sympathetic both match; sympathetic comes first in the table
		expect(detectTone('That sucks, I\'m sorry.')).toBe('sympathetic');
	});

	it('treats typographic apostrophes like plain ones', () => {
		expect(detectTone('Don’t worry about it.')).toBe('reassuring');
	});

	it('ignores phrases glued to longer words', () => {
		expect(detectTone('I love lollipops.')).toBe('neutral');
	});

	it('uses exclamation density as an excitement cue', () => {
		expect(detectTone('We did it!! Wow!')).toBe('excited');
	});

	it('does not treat a single exclamation as excitement', () => {
		expect(detectTone('Great!')).toBe('neutral');
		expect(detectTone('Hello! How can I help you today? Tell me more. Anything else?')).toBe('neutral');
	});

	it('is deterministic and always returns a known label', () => {
		const samples = [
			'',
			'Congrats on the new job.',
			'That sucks, I\'m sorry.',
			'We did it!! Wow!',
			'Random words with no cues at all',
			'?!?!?!'
		];
		for (const sample of samples) {
			const first = detectTone(sample);
			expect(detectTone(sample)).toBe(first);
			expect(TONE_LABELS).toContain(first);
		};
	});
});

describe('ToneClassifier', () => {
	it('reports which rule fired', () => {
		expect(defaultToneClassifier.explain('Congrats on the new job.')).toEqual({
			tone: 'happy',
			rule: '4:happy'
		});
	});

	it('reports no rule for the neutral fallback', () => {
		expect(defaultToneClassifier.explain('Noted.')).toEqual({ tone: 'neutral', rule: null });
	});

	it('evaluates a custom table in order', () => {
		const classifier = new ToneClassifier(compileToneRules([
			{ tone: 'caution', phrases: ['careful'] },
			{ tone: 'happy', phrases: ['careful'] }
		]));
		expect(classifier.detect('Be careful.')).toBe('caution');
	});

	it('rejects rule files with unknown tones', () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tone-rules-'));
		const file = path.join(dir, 'rules.json');
		fs.writeFileSync(file, JSON.stringify({ rules: [{ tone: 'angry', phrases: ['grr'] }] }));
		try {
			expect(() => loadToneRules(file)).toThrow();
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		};
	});
});
