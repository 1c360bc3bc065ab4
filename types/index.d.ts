import type { ToneLabel } from '../src/prosody/tones.ts';
import type { ProsodyDirective } from '../src/prosody/ProsodyRewriter.ts';

/**
 * One prior message in the conversation, supplied by the client with each request
 */
export interface ChatTurn {
	role: 'user' | 'assistant';
	text: string;
}

/**
 * Persona preset that selects the system instruction for the chat model
 */
export type ChatMode = 'friendly' | 'balanced' | 'therapist';

export interface ChatRequest {
	history: ChatTurn[];
	message: string;
	mode: ChatMode;
}

/**
 * Body of a successful POST /chat
 */
export interface ChatReply {
	text: string;
	audio_url: string;
	tone: ToneLabel;
}

/**
 * Raw PCM returned by a speech synthesizer
 */
export interface SynthesizedAudio {
	pcm: Buffer;
	sampleRate: number;
	channels: number;
	bitDepth: number;
}

/**
 * An uploaded recording as received from the browser
 */
export interface AudioUpload {
	bytes: Buffer;
	mimeType: string;
	fileName?: string;
}

/**
 * Generated audio file on disk, served under /audio
 */
export interface AudioArtifact {
	fileName: string;
	filePath: string;
	url: string;
}

export interface ChatModel {
	complete(systemInstruction: string, history: ChatTurn[], message: string): Promise<string>;
}

export interface SpeechSynthesizer {
	synthesize(directive: ProsodyDirective): Promise<SynthesizedAudio>;
}

export interface Transcriber {
	transcribe(audio: AudioUpload): Promise<string>;
}
