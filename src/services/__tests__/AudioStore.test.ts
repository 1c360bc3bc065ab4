import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { AudioStore } from '../AudioStore.ts';
import { StorageError } from '../../utils/errors.ts';
import { encodeWav } from '../../utils/wav.ts';
import type { SynthesizedAudio } from '../../../types/index.d.ts';

const audio: SynthesizedAudio = { pcm: Buffer.from([1, 2, 3, 4]), sampleRate: 24000, channels: 1, bitDepth: 16 };

describe('AudioStore', () => {
	let root: string;
	let dir: string;

	beforeEach(() => {
		root = fs.mkdtempSync(path.join(os.tmpdir(), 'audio-store-'));
		dir = path.join(root, 'audio');
	});

	afterEach(() => {
		fs.rmSync(root, { recursive: true, force: true });
	});

	it('creates its directory', () => {
		new AudioStore(dir);
		expect(fs.statSync(dir).isDirectory()).toBe(true);
	});

	it('writes a WAV file and returns its URL', async () => {
		const store = new AudioStore(dir);
		const artifact = await store.save(audio);

		expect(artifact.fileName).toMatch(/^[0-9a-f-]{36}\.wav$/);
		expect(artifact.url).toBe(`/audio/${artifact.fileName}`);
		expect(artifact.filePath).toBe(path.join(dir, artifact.fileName));
		expect(fs.readFileSync(artifact.filePath)).toEqual(encodeWav(audio.pcm, audio));
	});

	it('never reuses a file name', async () => {
		const store = new AudioStore(dir);
		const [first, second] = await Promise.all([store.save(audio), store.save(audio)]);
		expect(first.fileName).not.toBe(second.fileName);
		expect(fs.readdirSync(dir)).toHaveLength(2);
	});

	it('reports write failures as storage errors', async () => {
		const store = new AudioStore(dir);
		fs.rmSync(dir, { recursive: true });

		await expect(store.save(audio)).rejects.toBeInstanceOf(StorageError);
		expect(fs.existsSync(dir)).toBe(false);
	});

	it('sweeps only WAV files older than the cutoff', async () => {
		const store = new AudioStore(dir);
		const old = await store.save(audio);
		const fresh = await store.save(audio);
		fs.writeFileSync(path.join(dir, 'notes.txt'), 'keep');

		const hourAgo = Date.now() / 1000 - 3600;
		fs.utimesSync(old.filePath, hourAgo, hourAgo);
		fs.utimesSync(path.join(dir, 'notes.txt'), hourAgo, hourAgo);

		const removed = await store.sweep(60_000);

		expect(removed).toEqual([old.fileName]);
		expect(fs.readdirSync(dir).sort()).toEqual([fresh.fileName, 'notes.txt'].sort());
	});
});
