export interface PcmFormat {
	sampleRate: number;
	channels: number;
	bitDepth: number;
}

const HEADER_BYTES = 44;

/**
 * Prepends a canonical 44-byte RIFF/WAVE header to little-endian PCM samples.
 */
export const encodeWav = (pcm: Buffer, format: PcmFormat): Buffer => {
	const { sampleRate, channels, bitDepth } = format;
	const blockAlign = channels * (bitDepth / 8);
	const header = Buffer.alloc(HEADER_BYTES);

	header.write('RIFF', 0, 'ascii');
	header.writeUInt32LE(36 + pcm.length, 4);
	header.write('WAVE', 8, 'ascii');
	header.write('fmt ', 12, 'ascii');
	header.writeUInt32LE(16, 16);
	header.writeUInt16LE(1, 20); // PCM
	header.writeUInt16LE(channels, 22);
	header.writeUInt32LE(sampleRate, 24);
	header.writeUInt32LE(sampleRate * blockAlign, 28);
	header.writeUInt16LE(blockAlign, 32);
	header.writeUInt16LE(bitDepth, 34);
	header.write('data', 36, 'ascii');
	header.writeUInt32LE(pcm.length, 40);

	return Buffer.concat([header, pcm]);
};
