import { createApp } from './app';
import { loadConfig } from './config';
import { JsonFileConversationRepository } from './services/conversationRepository';
import { ConversationEngine } from './services/conversationEngine';
import { KeywordFrustrationDetector } from './services/frustrationDetector';
import { createOpenAICompletionClient } from './services/openaiClient';
import { StaticQuoteProvider } from './services/quoteProvider';
import { LlmReplyGenerator } from './services/replyGenerator';
import { NhtsaVehicleLookup } from './services/vehicleLookup';
import { logger } from './utils/logger';

const config = loadConfig();
logger.level = config.logLevel;

if (!config.openai.apiKey) {
  logger.warn('OPENAI_API_KEY is not set; replies will use fixed fallback text');
}

const engine = new ConversationEngine({
  repository: new JsonFileConversationRepository(config.dataPath),
  lookup: new NhtsaVehicleLookup({ baseUrl: config.nhtsa.baseUrl, timeoutMs: config.nhtsa.timeoutMs }),
  replyGenerator: new LlmReplyGenerator(createOpenAICompletionClient(config.openai)),
  frustrationDetector: new KeywordFrustrationDetector(),
  quoteProvider: new StaticQuoteProvider(),
  replyTimeoutMs: config.replyTimeoutMs
});

// Boot
const app = createApp(engine);
app.listen(config.port, () => {
  logger.info(`API listening on http://localhost:${config.port}`, { dataPath: config.dataPath });
});
