import { z } from 'zod';
import { CHAT_MODES, DEFAULT_CHAT_MODE, systemInstruction } from '../personas.ts';
import { direct } from '../prosody/ProsodyRewriter.ts';
import { defaultToneClassifier, type ToneClassifier } from '../prosody/ToneClassifier.ts';
import { ClientError, ErrorCodes } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import type { AudioStore } from './AudioStore.ts';
import type {
	ChatModel,
	ChatReply,
	ChatRequest,
	ChatTurn,
	SpeechSynthesizer
} from '../../types/index.d.ts';

// History items may carry their words as `text` or `content`.
const ChatTurnSchema = z
	.object({
		role: z.enum(['user', 'assistant']),
		text: z.string().optional(),
		content: z.string().optional()
	})
	.transform((turn, ctx): ChatTurn => {
		const text = turn.text ?? turn.content;
		if (!text?.trim()) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'history item needs text' });
			return z.NEVER;
		};
		return { role: turn.role, text };
	});

const ChatRequestSchema = z.object({
	history: z.array(ChatTurnSchema).nullish().transform((history) => history ?? []),
	message: z.string({ required_error: 'message is required' }),
	mode: z
		.string()
		.nullish()
		.transform((mode) => CHAT_MODES.find((known) => known === mode?.toLowerCase()) ?? DEFAULT_CHAT_MODE)
});

/**
 * Validates a POST /chat body. Unknown modes fall back to the default persona.
 */
export const parseChatRequest = (body: unknown): ChatRequest => {
	const parsed = ChatRequestSchema.safeParse(body);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
		throw new ClientError(ErrorCodes.VALIDATION_ERROR, `Invalid chat request: ${where}${issue?.message ?? 'malformed body'}`);
	};
	return parsed.data;
};

export interface ChatOrchestratorOptions {
	chat: ChatModel;
	speech: SpeechSynthesizer;
	audioStore: AudioStore;
	assistantName: string;
	classifier?: ToneClassifier;
}

/**
 * Runs one chat turn: completion, tone, prosody, synthesis, audio file.
 * Nothing is written to disk unless synthesis succeeded.
 */
export class ChatOrchestrator {
	private chat: ChatModel;
	private speech: SpeechSynthesizer;
	private audioStore: AudioStore;
	private assistantName: string;
	private classifier: ToneClassifier;

	constructor(options: ChatOrchestratorOptions) {
		this.chat = options.chat;
		this.speech = options.speech;
		this.audioStore = options.audioStore;
		this.assistantName = options.assistantName;
		this.classifier = options.classifier ?? defaultToneClassifier;
	};

	public async handleChat(request: ChatRequest): Promise<ChatReply> {
		const message = request.message.trim();
		if (!message)
			throw new ClientError(ErrorCodes.EMPTY_MESSAGE, 'Message must not be empty');

		const reply = await this.chat.complete(
			systemInstruction(request.mode, this.assistantName),
			request.history,
			message
		);

		const { tone, rule } = this.classifier.explain(reply);
		logger.debug(`Reply tone: ${tone} (${rule ?? 'fallback'})`);

		const audio = await this.speech.synthesize(direct(reply, tone));
		const artifact = await this.audioStore.save(audio);

		return { text: reply, audio_url: artifact.url, tone };
	};
};
