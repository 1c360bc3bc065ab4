import { ApiError, GoogleGenAI, Modality } from '@google/genai';
import type { Content, GenerateContentResponse } from '@google/genai';
import type { AppConfig } from '../config.ts';
import type { ProsodyDirective } from '../prosody/ProsodyRewriter.ts';
import { ClientError, ErrorCodes, UpstreamError, errorMessage } from '../utils/errors.ts';
import type { UpstreamService } from '../utils/errors.ts';
import type {
	AudioUpload,
	ChatModel,
	ChatTurn,
	SpeechSynthesizer,
	SynthesizedAudio,
	Transcriber
} from '../../types/index.d.ts';

/**
 * The slice of the SDK the adapters call; tests hand in a fake.
 */
export type ContentGenerator = Pick<GoogleGenAI['models'], 'generateContent'>;

const TTS_SAMPLE_RATE = 24000;
// A 400 is only the caller's fault when the provider names the audio input.
const AUDIO_REJECTION = /\b(audio|mime ?type|inline ?data|media|decode)\b/i;
const TRANSCRIBE_PROMPT =
	'Transcribe the speech in this recording verbatim. Reply with the transcript only, without commentary. If nothing is said, reply with nothing.';

export const createGeminiClient = (google: AppConfig['google']): GoogleGenAI =>
	new GoogleGenAI({
		apiKey: google.apiKey,
		httpOptions: { timeout: google.timeoutMs }
	});

/**
 * Wraps an SDK failure; HTTP 429 from the provider is reported as quota exhaustion.
 */
export const upstreamFailure = (service: UpstreamService, error: unknown): UpstreamError => {
	const quota = error instanceof ApiError && error.status === 429;
	return new UpstreamError(
		service,
		quota
			? `The ${service} service quota is exhausted`
			: `The ${service} service failed: ${errorMessage(error)}`,
		{ cause: error, quota }
	);
};

const toContents = (history: ChatTurn[], message: string): Content[] => [
	...history.map((turn): Content => ({
		role: turn.role === 'assistant' ? 'model' : 'user',
		parts: [{ text: turn.text }]
	})),
	{ role: 'user', parts: [{ text: message }] }
];

export class GeminiChat implements ChatModel {
	private models: ContentGenerator;
	private model: string;

	constructor(models: ContentGenerator, model: string) {
		this.models = models;
		this.model = model;
	};

	public async complete(systemInstruction: string, history: ChatTurn[], message: string): Promise<string> {
		let response: GenerateContentResponse;
		try {
			response = await this.models.generateContent({
				model: this.model,
				contents: toContents(history, message),
				config: { systemInstruction }
			});
		} catch (error) {
			throw upstreamFailure('chat', error);
		};

		const text = response.text?.trim();
		if (!text)
			throw new UpstreamError('chat', 'The chat service returned an empty reply');
		return text;
	};
};

export const parseSampleRate = (mimeType: string | undefined): number => {
	const match = mimeType ? /rate=(\d+)/i.exec(mimeType) : null;
	return match ? parseInt(match[1] ?? '', 10) : TTS_SAMPLE_RATE;
};

export class GeminiSpeech implements SpeechSynthesizer {
	private models: ContentGenerator;
	private model: string;
	private voice: string;

	constructor(models: ContentGenerator, model: string, voice: string) {
		this.models = models;
		this.model = model;
		this.voice = voice;
	};

	public async synthesize(directive: ProsodyDirective): Promise<SynthesizedAudio> {
		let response: GenerateContentResponse;
		try {
			response = await this.models.generateContent({
				model: this.model,
				// The style line steers delivery; the model does not read it aloud.
				contents: [{ role: 'user', parts: [{ text: `${directive.delivery}:\n\n${directive.text}` }] }],
				config: {
					responseModalities: [Modality.AUDIO],
					speechConfig: {
						voiceConfig: { prebuiltVoiceConfig: { voiceName: this.voice } }
					}
				}
			});
		} catch (error) {
			throw upstreamFailure('speech', error);
		};

		const inline = response.candidates?.[0]?.content?.parts
			?.find((part) => part.inlineData?.data)
			?.inlineData;
		if (!inline?.data)
			throw new UpstreamError('speech', 'The speech service returned no audio');

		const mimeType = inline.mimeType?.toLowerCase() ?? '';
		if (mimeType && !mimeType.startsWith('audio/l16') && !mimeType.startsWith('audio/pcm'))
			throw new UpstreamError('speech', `The speech service returned unsupported audio (${mimeType})`);

		return {
			pcm: Buffer.from(inline.data, 'base64'),
			sampleRate: parseSampleRate(mimeType),
			channels: 1,
			bitDepth: 16
		};
	};
};

export class GeminiTranscriber implements Transcriber {
	private models: ContentGenerator;
	private model: string;

	constructor(models: ContentGenerator, model: string) {
		this.models = models;
		this.model = model;
	};

	public async transcribe(audio: AudioUpload): Promise<string> {
		let response: GenerateContentResponse;
		try {
			response = await this.models.generateContent({
				model: this.model,
				contents: [{
					role: 'user',
					parts: [
						{ text: TRANSCRIBE_PROMPT },
						{ inlineData: { mimeType: audio.mimeType, data: audio.bytes.toString('base64') } }
					]
				}]
			});
		} catch (error) {
			if (error instanceof ApiError && error.status === 400 && AUDIO_REJECTION.test(error.message))
				throw new ClientError(ErrorCodes.INVALID_AUDIO, 'The recording could not be decoded', { cause: error });
			throw upstreamFailure('transcription', error);
		};

		return response.text?.trim() ?? '';
	};
};
