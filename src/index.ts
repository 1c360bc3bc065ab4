import { loadConfig } from './config.ts';
import { AudioStore } from './services/AudioStore.ts';
import { AvatarSelector } from './services/AvatarSelector.ts';
import { ChatOrchestrator } from './services/ChatOrchestrator.ts';
import { GeminiChat, GeminiSpeech, GeminiTranscriber, createGeminiClient } from './services/Gemini.ts';
import { Server } from './services/Server.ts';
import { TranscriptionAdapter } from './services/TranscriptionAdapter.ts';
import { logger } from './utils/logger.ts';

try {
	const config = loadConfig();
	logger.setLevel(config.system.logLevel);
	logger.title('Voice companion');
	logger.log('Chat model:', config.google.chatModel);
	logger.log('Speech model:', `${config.google.ttsModel} (${config.google.ttsVoice})`);
	logger.log('Transcription model:', config.google.sttModel);

	const client = createGeminiClient(config.google);
	const audioStore = new AudioStore(config.paths.audioDir);

	const server = new Server({
		config,
		audioStore,
		conversation: new ChatOrchestrator({
			chat: new GeminiChat(client.models, config.google.chatModel),
			speech: new GeminiSpeech(client.models, config.google.ttsModel, config.google.ttsVoice),
			audioStore,
			assistantName: config.assistantName
		}),
		transcription: new TranscriptionAdapter(
			new GeminiTranscriber(client.models, config.google.sttModel)
		),
		avatars: new AvatarSelector()
	});

	await server.listen();

	// Handle process exit
	process.on('SIGINT', () => {
		logger.log('Stopping...');
		server.close()
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logger.error('Failed to stop cleanly:', error);
				process.exit(1);
			});
	});
} catch (error) {
	logger.error('Failed to initialize application:', error);
	process.exit(1);
};
