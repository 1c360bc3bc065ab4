import * as http from 'http';
import type { AddressInfo } from 'net';
import type { AppConfig } from '../config.ts';
import { ClientError, ErrorCodes, toAppError } from '../utils/errors.ts';
import { CORS_HEADERS, notFound, readAudioUpload, readJson, sendError, sendJson, serveStatic } from '../utils/http.ts';
import { logger } from '../utils/logger.ts';
import { AUDIO_ROUTE, type AudioStore } from './AudioStore.ts';
import { VIDEO_ROUTE, type AvatarSelector } from './AvatarSelector.ts';
import { parseChatRequest, type ChatOrchestrator } from './ChatOrchestrator.ts';
import type { TranscriptionAdapter } from './TranscriptionAdapter.ts';

const CHAT_BODY_LIMIT = 1024 * 1024;
// multipart boundaries and headers on top of the audio itself
const MULTIPART_OVERHEAD = 64 * 1024;
const SWEEP_INTERVAL_MS = 60_000;

export interface ServerOptions {
	config: AppConfig;
	conversation: ChatOrchestrator;
	transcription: TranscriptionAdapter;
	audioStore: AudioStore;
	avatars: AvatarSelector;
}

type Handler = (req: http.IncomingMessage, res: http.ServerResponse, rest: string) => Promise<void>;

interface Route {
	method: 'GET' | 'POST';
	/** Exact path, or a prefix ending in '/' that hands the remainder to the handler. */
	path: string;
	handler: Handler;
}

export class Server {
	private options: ServerOptions;
	private http: http.Server;
	private routes: Route[];
	private sweeper: NodeJS.Timeout | null = null;

	constructor(options: ServerOptions) {
		this.options = options;
		const { paths } = options.config;

		this.routes = [
			{ method: 'GET', path: '/', handler: (_req, res) => serveStatic(res, paths.frontendDir, 'index.html') },
			{ method: 'GET', path: '/favicon.ico', handler: (_req, res) => serveStatic(res, paths.frontendDir, 'favicon.ico') },
			{ method: 'GET', path: '/health', handler: this.health },
			{ method: 'POST', path: '/chat', handler: this.chat },
			{ method: 'POST', path: '/transcribe', handler: this.transcribe },
			{ method: 'GET', path: '/avatar/', handler: this.avatar },
			{ method: 'GET', path: `${AUDIO_ROUTE}/`, handler: (_req, res, rest) => serveStatic(res, options.audioStore.directory, rest) },
			{ method: 'GET', path: `${VIDEO_ROUTE}/`, handler: (_req, res, rest) => serveStatic(res, paths.videoDir, rest) },
			{ method: 'GET', path: '/frontend/', handler: (_req, res, rest) => serveStatic(res, paths.frontendDir, rest || 'index.html') }
		];

		this.http = http.createServer((req, res) => {
			this.handleRequest(req, res).catch((error: unknown) => {
				logger.error('Unhandled request failure:', error);
				if (!res.headersSent) sendError(res, toAppError(error));
				else res.destroy();
			});
		});
	};

	public listen(port: number = this.options.config.system.port, host: string = this.options.config.system.host): Promise<AddressInfo> {
		return new Promise((resolve, reject) => {
			this.http.once('error', reject);
			this.http.listen(port, host, () => {
				this.http.off('error', reject);
				const address = this.http.address();
				if (address === null || typeof address === 'string') {
					reject(new Error('Server is not listening on a TCP port'));
					return;
				};
				logger.success(`HTTP server listening on http://${address.address}:${address.port}`);
				this.startSweeper();
				resolve(address);
			});
		});
	};

	public close(): Promise<void> {
		if (this.sweeper) {
			clearInterval(this.sweeper);
			this.sweeper = null;
		};
		return new Promise((resolve, reject) => {
			this.http.close((error) => (error ? reject(error) : resolve()));
			this.http.closeAllConnections();
		});
	};

	private startSweeper(): void {
		const ttlSeconds = this.options.config.audioTtlSeconds;
		if (ttlSeconds <= 0 || this.sweeper) return;

		logger.info(`Deleting generated audio older than ${ttlSeconds}s`);
		this.sweeper = setInterval(() => {
			this.options.audioStore.sweep(ttlSeconds * 1000).catch((error: unknown) =>
				logger.error('Audio cleanup failed:', error)
			);
		}, SWEEP_INTERVAL_MS);
		this.sweeper.unref();
	};

	private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		const started = Date.now();
		const method = req.method ?? 'GET';
		let pathname = req.url ?? '/';

		res.on('finish', () => {
			logger.debug(`${method} ${pathname} ${res.statusCode} ${Date.now() - started}ms`);
		});

		if (method === 'OPTIONS') {
			res.writeHead(204, CORS_HEADERS);
			res.end();
			return;
		};

		try {
			pathname = this.parsePath(pathname);
			const match = this.match(pathname);
			if (!match) throw notFound();

			const route = match.routes.find((candidate) => candidate.method === method);
			if (!route)
				throw new ClientError(ErrorCodes.METHOD_NOT_ALLOWED, `${method} is not allowed on ${pathname}`);

			await route.handler(req, res, match.rest);
		} catch (error) {
			const appError = toAppError(error);
			if (appError.status >= 500)
				logger.error(`${method} ${pathname} failed:`, appError.message);
			else
				logger.warn(`${method} ${pathname} rejected: ${appError.message}`);

			if (res.headersSent) res.destroy();
			else sendError(res, appError);
		};
	};

	private parsePath(target: string): string {
		try {
			return new URL(target, 'http://localhost').pathname;
		} catch (error) {
			throw new ClientError(ErrorCodes.NOT_FOUND, 'Not found', { cause: error });
		};
	};

	private match(pathname: string): { routes: Route[]; rest: string } | null {
		const exact = this.routes.filter((route) => route.path === pathname);
		if (exact.length > 0) return { routes: exact, rest: '' };

		const prefixed = this.routes.filter((route) =>
			route.path.endsWith('/') && route.path !== '/' && pathname.startsWith(route.path)
		);
		const first = prefixed[0];
		if (!first) return null;
		return {
			routes: prefixed.filter((route) => route.path === first.path),
			rest: pathname.slice(first.path.length)
		};
	};

	private health: Handler = async (_req, res) => {
		sendJson(res, 200, {
			status: 'ok',
			timestamp: new Date().toISOString(),
			service: 'voice-companion'
		});
	};

	private chat: Handler = async (req, res) => {
		const request = parseChatRequest(await readJson(req, CHAT_BODY_LIMIT));
		const reply = await this.options.conversation.handleChat(request);
		logger.success(`Chat reply ready (tone: ${reply.tone})`);
		sendJson(res, 200, reply);
	};

	private transcribe: Handler = async (req, res) => {
		const upload = await readAudioUpload(req, this.options.config.system.maxUploadBytes + MULTIPART_OVERHEAD);
		if (upload.bytes.length > this.options.config.system.maxUploadBytes)
			throw new ClientError(ErrorCodes.PAYLOAD_TOO_LARGE, 'The recording is too large');

		const text = await this.options.transcription.transcribe(upload);
		sendJson(res, 200, { text });
	};

	private avatar: Handler = async (_req, res, rest) => {
		let tone: string;
		try {
			tone = decodeURIComponent(rest);
		} catch (error) {
			throw new ClientError(ErrorCodes.VALIDATION_ERROR, 'Malformed tone label', { cause: error });
		};

		res.writeHead(302, {
			...CORS_HEADERS,
			Location: this.options.avatars.url(tone.toLowerCase())
		});
		res.end();
	};
};
