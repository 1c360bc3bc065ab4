import { CONTAINER_MIME_TYPES, sniffAudioContainer } from '../utils/audioFormat.ts';
import { ClientError, ErrorCodes } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import type { AudioUpload, Transcriber } from '../../types/index.d.ts';

/**
 * Checks an uploaded recording and forwards it to the speech-to-text service.
 * Bad recordings are client errors; provider failures stay upstream errors.
 */
export class TranscriptionAdapter {
	private transcriber: Transcriber;

	constructor(transcriber: Transcriber) {
		this.transcriber = transcriber;
	};

	public async transcribe(upload: AudioUpload): Promise<string> {
		if (upload.bytes.length === 0)
			throw new ClientError(ErrorCodes.EMPTY_AUDIO, 'The uploaded recording is empty');

		const container = sniffAudioContainer(upload.bytes);
		if (!container)
			throw new ClientError(
				ErrorCodes.UNSUPPORTED_MEDIA,
				`Unsupported audio format${upload.mimeType ? ` (${upload.mimeType})` : ''}`
			);

		logger.debug(`Transcribing ${upload.bytes.length} bytes of ${container} audio`);
		const text = await this.transcriber.transcribe({
			...upload,
			mimeType: CONTAINER_MIME_TYPES[container]
		});
		logger.info(`Transcribed text: ${JSON.stringify(text)}`);
		return text;
	};
};
