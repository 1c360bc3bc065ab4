/**
 * Recognises audio containers from their leading bytes. Browsers label
 * MediaRecorder uploads inconsistently, so the bytes decide the format
 * rather than the declared content type.
 */

export type AudioContainer = 'webm' | 'ogg' | 'wav' | 'mp3' | 'flac' | 'mp4' | 'aac';

export const CONTAINER_MIME_TYPES: Record<AudioContainer, string> = {
	webm: 'audio/webm',
	ogg: 'audio/ogg',
	wav: 'audio/wav',
	mp3: 'audio/mpeg',
	flac: 'audio/flac',
	mp4: 'audio/mp4',
	aac: 'audio/aac'
};

const startsWith = (bytes: Buffer, signature: number[], offset: number = 0): boolean =>
	bytes.length >= offset + signature.length &&
	signature.every((byte, index) => bytes[offset + index] === byte);

const ascii = (text: string): number[] => [...text].map((char) => char.charCodeAt(0));

export const sniffAudioContainer = (bytes: Buffer): AudioContainer | null => {
	if (startsWith(bytes, [0x1a, 0x45, 0xdf, 0xa3])) return 'webm';
	if (startsWith(bytes, ascii('OggS'))) return 'ogg';
	if (startsWith(bytes, ascii('RIFF')) && startsWith(bytes, ascii('WAVE'), 8)) return 'wav';
	if (startsWith(bytes, ascii('fLaC'))) return 'flac';
	if (startsWith(bytes, ascii('ID3'))) return 'mp3';
	if (startsWith(bytes, ascii('ftyp'), 4)) return 'mp4';

	const [first, second] = bytes;
	if (first === 0xff && second !== undefined) {
		// ADTS sync: 12 set bits with layer bits 00; MPEG audio uses a non-zero layer
		if ((second & 0xf6) === 0xf0) return 'aac';
		if ((second & 0xe0) === 0xe0 && (second & 0x06) !== 0) return 'mp3';
	};

	return null;
};
