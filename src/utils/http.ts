import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import type { IncomingMessage, ServerResponse } from 'http';
import { pipeline } from 'stream/promises';
import { AppError, ClientError, ErrorCodes } from './errors.ts';
import type { AudioUpload } from '../../types/index.d.ts';

export const CORS_HEADERS = {
	'Access-Control-Allow-Origin': '*',
	'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
	'Access-Control-Allow-Headers': 'Content-Type'
} as const;

const CONTENT_TYPES: Record<string, string> = {
	'.html': 'text/html; charset=utf-8',
	'.js': 'text/javascript; charset=utf-8',
	'.css': 'text/css; charset=utf-8',
	'.json': 'application/json; charset=utf-8',
	'.svg': 'image/svg+xml',
	'.png': 'image/png',
	'.ico': 'image/x-icon',
	'.wav': 'audio/wav',
	'.mp3': 'audio/mpeg',
	'.mp4': 'video/mp4',
	'.webm': 'video/webm'
};

export const sendJson = (res: ServerResponse, status: number, body: unknown): void => {
	const payload = JSON.stringify(body);
	res.writeHead(status, {
		...CORS_HEADERS,
		'Content-Type': 'application/json; charset=utf-8',
		'Content-Length': Buffer.byteLength(payload)
	});
	res.end(payload);
};

export const sendError = (res: ServerResponse, error: AppError): void =>
	sendJson(res, error.status, { error: { code: error.code, message: error.message } });

export const notFound = (): ClientError =>
	new ClientError(ErrorCodes.NOT_FOUND, 'Not found');

/**
 * Buffers a request body, failing with 413 once it grows past `limit` bytes.
 */
export const readBody = async (req: IncomingMessage, limit: number): Promise<Buffer> => {
	const declared = Number(req.headers['content-length']);
	if (Number.isFinite(declared) && declared > limit)
		throw new ClientError(ErrorCodes.PAYLOAD_TOO_LARGE, `Request body exceeds ${limit} bytes`);

	const chunks: Buffer[] = [];
	let size = 0;
	for await (const chunk of req) {
		const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += buffer.length;
		if (size > limit)
			throw new ClientError(ErrorCodes.PAYLOAD_TOO_LARGE, `Request body exceeds ${limit} bytes`);
		chunks.push(buffer);
	};
	return Buffer.concat(chunks);
};

export const readJson = async (req: IncomingMessage, limit: number): Promise<unknown> => {
	const body = await readBody(req, limit);
	try {
		return JSON.parse(body.toString('utf-8'));
	} catch (error) {
		throw new ClientError(ErrorCodes.VALIDATION_ERROR, 'Request body must be valid JSON', { cause: error });
	};
};

/**
 * Pulls the uploaded recording out of a multipart form: the `file` field,
 * or else the first file part.
 */
export const readAudioUpload = async (req: IncomingMessage, limit: number): Promise<AudioUpload> => {
	const contentType = req.headers['content-type'] ?? '';
	if (!contentType.toLowerCase().startsWith('multipart/form-data'))
		throw new ClientError(ErrorCodes.UNSUPPORTED_MEDIA, 'Expected a multipart/form-data upload');

	const body = await readBody(req, limit);
	let form: FormData;
	try {
		form = await new Response(body, { headers: { 'content-type': contentType } }).formData();
	} catch (error) {
		throw new ClientError(ErrorCodes.VALIDATION_ERROR, 'Malformed multipart body', { cause: error });
	};

	const named = form.get('file');
	let file = named !== null && typeof named !== 'string' ? named : null;
	if (!file)
		for (const [, value] of form)
			if (typeof value !== 'string') {
				file = value;
				break;
			};

	if (!file)
		throw new ClientError(ErrorCodes.VALIDATION_ERROR, 'No audio file in the upload');

	return {
		bytes: Buffer.from(await file.arrayBuffer()),
		mimeType: file.type,
		fileName: file.name
	};
};

/**
 * Streams `relativePath` from inside `root`. Paths that escape the root or
 * do not name a regular file are reported as 404.
 */
export const serveStatic = async (res: ServerResponse, root: string, relativePath: string): Promise<void> => {
	let decoded: string;
	try {
		decoded = decodeURIComponent(relativePath);
	} catch {
		throw notFound();
	};

	const base = path.resolve(root);
	const filePath = path.resolve(base, decoded.replace(/^\/+/, ''));
	if (!filePath.startsWith(base + path.sep))
		throw notFound();

	const stats = await fsp.stat(filePath).catch(() => null);
	if (!stats?.isFile())
		throw notFound();

	res.writeHead(200, {
		...CORS_HEADERS,
		'Content-Type': CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream',
		'Content-Length': stats.size
	});
	await pipeline(fs.createReadStream(filePath), res);
};
