/**
 * Error taxonomy shared by the services and the HTTP layer.
 * Every error that reaches a client is one of these, rendered as
 * `{ error: { code, message } }` with the matching status.
 */

export const ErrorCodes = {
	VALIDATION_ERROR: { code: 'validation_error', status: 400 },
	EMPTY_MESSAGE: { code: 'empty_message', status: 400 },
	EMPTY_AUDIO: { code: 'empty_audio', status: 400 },
	NOT_FOUND: { code: 'not_found', status: 404 },
	METHOD_NOT_ALLOWED: { code: 'method_not_allowed', status: 405 },
	PAYLOAD_TOO_LARGE: { code: 'payload_too_large', status: 413 },
	UNSUPPORTED_MEDIA: { code: 'unsupported_media', status: 415 },
	INVALID_AUDIO: { code: 'invalid_audio', status: 422 },
	UPSTREAM_ERROR: { code: 'upstream_error', status: 502 },
	UPSTREAM_QUOTA: { code: 'upstream_quota', status: 503 },
	STORAGE_ERROR: { code: 'storage_error', status: 500 },
	INTERNAL_ERROR: { code: 'internal_error', status: 500 }
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class AppError extends Error {
	public readonly code: string;
	public readonly status: number;

	constructor(error: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = error.code;
		this.status = error.status;
	};
};

/**
 * Bad input from the caller: empty message, malformed body, unreadable audio.
 */
export class ClientError extends AppError {};

/**
 * A chat, speech or transcription provider failed or refused the call.
 */
export class UpstreamError extends AppError {
	public readonly service: UpstreamService;

	constructor(service: UpstreamService, message: string, options?: { cause?: unknown; quota?: boolean }) {
		super(options?.quota ? ErrorCodes.UPSTREAM_QUOTA : ErrorCodes.UPSTREAM_ERROR, message, options);
		this.service = service;
	};
};

export type UpstreamService = 'chat' | 'speech' | 'transcription';

/**
 * Local filesystem failure, e.g. the audio artifact could not be written.
 */
export class StorageError extends AppError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(ErrorCodes.STORAGE_ERROR, message, options);
	};
};

export const toAppError = (error: unknown): AppError => {
	if (error instanceof AppError) return error;
	const message = error instanceof Error ? error.message : String(error);
	return new AppError(ErrorCodes.INTERNAL_ERROR, message, { cause: error });
};

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
