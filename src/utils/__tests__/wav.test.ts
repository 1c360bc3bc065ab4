import { describe, it, expect } from 'vitest';
import { encodeWav } from '../wav.ts';

describe('encodeWav', () => {
	const pcm = Buffer.from([1, 2, 3, 4]);
	const wav = encodeWav(pcm, { sampleRate: 24000, channels: 1, bitDepth: 16 });

	it('prepends a 44-byte header', () => {
		expect(wav.length).toBe(48);
		expect(wav.subarray(44)).toEqual(pcm);
	});

	it('writes the RIFF and format chunks', () => {
		expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
		expect(wav.readUInt32LE(4)).toBe(40);
		expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
		expect(wav.readUInt32LE(16)).toBe(16);
		expect(wav.readUInt16LE(20)).toBe(1);
		expect(wav.readUInt16LE(22)).toBe(1);
		expect(wav.readUInt32LE(24)).toBe(24000);
		expect(wav.readUInt32LE(28)).toBe(48000);
		expect(wav.readUInt16LE(32)).toBe(2);
		expect(wav.readUInt16LE(34)).toBe(16);
	});

	it('writes the data chunk size', () => {
		expect(wav.toString('ascii', 36, 40)).toBe('data');
		expect(wav.readUInt32LE(40)).toBe(4);
	});

	it('accounts for stereo block alignment', () => {
		const stereo = encodeWav(Buffer.alloc(8), { sampleRate: 44100, channels: 2, bitDepth: 16 });
		expect(stereo.readUInt32LE(28)).toBe(176400);
		expect(stereo.readUInt16LE(32)).toBe(4);
	});
});
