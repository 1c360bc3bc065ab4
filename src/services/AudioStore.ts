import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { StorageError, errorMessage } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import { encodeWav } from '../utils/wav.ts';
import type { AudioArtifact, SynthesizedAudio } from '../../types/index.d.ts';

export const AUDIO_ROUTE = '/audio';

/**
 * Writes synthesized speech to uniquely named WAV files under one directory.
 */
export class AudioStore {
	public readonly directory: string;

	constructor(directory: string) {
		this.directory = directory;
		if (!fs.existsSync(directory))
			fs.mkdirSync(directory, { recursive: true });
	};

	public async save(audio: SynthesizedAudio): Promise<AudioArtifact> {
		const fileName = `${uuidv4()}.wav`;
		const filePath = path.join(this.directory, fileName);

		try {
			// 'wx': never overwrite an existing artifact
			await fsp.writeFile(filePath, encodeWav(audio.pcm, audio), { flag: 'wx' });
		} catch (error) {
			await fsp.rm(filePath, { force: true }).catch((cleanupError: unknown) =>
				logger.warn(`Could not remove partial audio file ${fileName}:`, errorMessage(cleanupError))
			);
			throw new StorageError(`Could not write audio file: ${errorMessage(error)}`, { cause: error });
		};

		logger.debug(`Saved audio ${fileName} (${audio.pcm.length} bytes of PCM)`);
		return { fileName, filePath, url: `${AUDIO_ROUTE}/${fileName}` };
	};

	/**
	 * Deletes generated audio older than `maxAgeMs`. Returns the names removed.
	 */
	public async sweep(maxAgeMs: number, now: number = Date.now()): Promise<string[]> {
		const cutoff = now - maxAgeMs;
		const removed: string[] = [];

		for (const entry of await fsp.readdir(this.directory, { withFileTypes: true })) {
			if (!entry.isFile() || !entry.name.endsWith('.wav')) continue;
			const filePath = path.join(this.directory, entry.name);
			try {
				const { mtimeMs } = await fsp.stat(filePath);
				if (mtimeMs < cutoff) {
					await fsp.unlink(filePath);
					removed.push(entry.name);
				};
			} catch (error) {
				logger.warn(`Could not remove old audio file ${entry.name}:`, errorMessage(error));
			};
		};

		if (removed.length > 0)
			logger.info(`Removed ${removed.length} old audio file(s)`);
		return removed;
	};
};
