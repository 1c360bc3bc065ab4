import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './utils/logger.ts';

dotenv.config();

/**
 * Configuration schema with validation
 */
interface GoogleConfig {
	apiKey: string;
	chatModel: string;
	ttsModel: string;
	ttsVoice: string;
	sttModel: string;
	timeoutMs: number;
};

interface SystemConfig {
	host: string;
	port: number;
	logLevel: LogLevel;
	maxUploadBytes: number;
};

interface PathsConfig {
	audioDir: string;
	videoDir: string;
	frontendDir: string;
};

export interface AppConfig {
	google: GoogleConfig;
	system: SystemConfig;
	paths: PathsConfig;
	assistantName: string;
	/** Age after which generated audio is deleted; 0 keeps files until removed by hand. */
	audioTtlSeconds: number;
};

const integer = (fallback: number) =>
	z.coerce.number().int().default(fallback);

const EnvSchema = z.object({
	PORT: integer(3000).refine((port) => port >= 1000 && port <= 65535, 'PORT must be an integer between 1000 and 65535'),
	HOST: z.string().min(1).default('0.0.0.0'),
	GOOGLE_API_KEY_FILE: z.string().min(1).default('gemini_key.env'),
	GEMINI_CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash'),
	GEMINI_TTS_MODEL: z.string().min(1).default('gemini-2.5-flash-preview-tts'),
	GEMINI_TTS_VOICE: z.string().min(1).default('Kore'),
	GEMINI_STT_MODEL: z.string().min(1).default('gemini-2.5-flash'),
	ASSISTANT_NAME: z.string().min(1).default('Aria'),
	AUDIO_DIR: z.string().min(1).default('audio'),
	VIDEO_DIR: z.string().min(1).default('video'),
	FRONTEND_DIR: z.string().min(1).default('frontend'),
	AUDIO_TTL_SECONDS: integer(0).refine((ttl) => ttl >= 0, 'AUDIO_TTL_SECONDS must not be negative'),
	MAX_UPLOAD_BYTES: integer(25 * 1024 * 1024).refine((size) => size > 0, 'MAX_UPLOAD_BYTES must be positive'),
	UPSTREAM_TIMEOUT_MS: integer(60_000).refine((ms) => ms > 0, 'UPSTREAM_TIMEOUT_MS must be positive'),
	LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

/**
 * Reads the API key from a file holding nothing but the key on a single line.
 */
export const readApiKey = (keyPath: string): string => {
	if (!fs.existsSync(keyPath))
		throw new Error(
			`API key file not found at ${keyPath}. Create it with your Gemini API key on a single line.`
		);

	const key = fs.readFileSync(keyPath, 'utf-8').trim();
	if (!key)
		throw new Error(`API key file ${keyPath} is empty. Put your Gemini API key in it.`);
	if (key.includes('\n'))
		throw new Error(`API key file ${keyPath} must contain a single line.`);

	return key;
};

/**
 * Validates the environment and returns the application configuration.
 * Throws if a value is invalid or the key file is missing.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig => {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ');
		throw new Error(`Invalid configuration: ${issues}`);
	};

	const values = parsed.data;
	const resolve = (target: string) => path.resolve(cwd, target);

	return {
		google: {
			apiKey: readApiKey(resolve(values.GOOGLE_API_KEY_FILE)),
			chatModel: values.GEMINI_CHAT_MODEL,
			ttsModel: values.GEMINI_TTS_MODEL,
			ttsVoice: values.GEMINI_TTS_VOICE,
			sttModel: values.GEMINI_STT_MODEL,
			timeoutMs: values.UPSTREAM_TIMEOUT_MS
		},
		system: {
			host: values.HOST,
			port: values.PORT,
			logLevel: values.LOG_LEVEL,
			maxUploadBytes: values.MAX_UPLOAD_BYTES
		},
		paths: {
			audioDir: resolve(values.AUDIO_DIR),
			videoDir: resolve(values.VIDEO_DIR),
			frontendDir: resolve(values.FRONTEND_DIR)
		},
		assistantName: values.ASSISTANT_NAME,
		audioTtlSeconds: values.AUDIO_TTL_SECONDS
	};
};
