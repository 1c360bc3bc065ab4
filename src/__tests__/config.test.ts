import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadConfig, readApiKey } from '../config.ts';

describe('loadConfig', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
		fs.writeFileSync(path.join(dir, 'gemini_key.env'), 'test-secret\n');
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('applies defaults and reads the key file', () => {
		const config = loadConfig({}, dir);

		expect(config.google).toEqual({
			apiKey: 'test-secret',
			chatModel: 'gemini-2.5-flash',
			ttsModel: 'gemini-2.5-flash-preview-tts',
			ttsVoice: 'Kore',
			sttModel: 'gemini-2.5-flash',
			timeoutMs: 60000
		});
		expect(config.system).toEqual({
			host: '0.0.0.0',
			port: 3000,
			logLevel: 'info',
			maxUploadBytes: 26214400
		});
		expect(config.paths.audioDir).toBe(path.join(dir, 'audio'));
		expect(config.assistantName).toBe('Aria');
		expect(config.audioTtlSeconds).toBe(0);
	});

	it('reads overrides from the environment', () => {
		fs.writeFileSync(path.join(dir, 'other.key'), 'other-secret');
		const config = loadConfig({
			GOOGLE_API_KEY_FILE: 'other.key',
			PORT: '8080',
			AUDIO_TTL_SECONDS: '300',
			GEMINI_TTS_VOICE: 'Puck',
			LOG_LEVEL: 'debug'
		}, dir);

		expect(config.google.apiKey).toBe('other-secret');
		expect(config.google.ttsVoice).toBe('Puck');
		expect(config.system.port).toBe(8080);
		expect(config.system.logLevel).toBe('debug');
		expect(config.audioTtlSeconds).toBe(300);
	});

	it('rejects a low port', () => {
		expect(() => loadConfig({ PORT: '80' }, dir)).toThrow(/PORT/);
	});

	it('rejects an unknown log level', () => {
		expect(() => loadConfig({ LOG_LEVEL: 'loud' }, dir)).toThrow(/LOG_LEVEL/);
	});

	it('fails when the key file is missing', () => {
		expect(() => loadConfig({ GOOGLE_API_KEY_FILE: 'missing.env' }, dir)).toThrow(/API key file not found/);
	});
});

describe('readApiKey', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'key-'));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('rejects an empty file', () => {
		const file = path.join(dir, 'key.env');
		fs.writeFileSync(file, '  \n');
		expect(() => readApiKey(file)).toThrow(/is empty/);
	});

	it('rejects more than one line', () => {
		const file = path.join(dir, 'key.env');
		fs.writeFileSync(file, 'first\nsecond\n');
		expect(() => readApiKey(file)).toThrow(/single line/);
	});
});
