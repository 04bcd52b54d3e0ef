import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { GeminiProvider } from './ai/provider_gemini.js';
import { AlphaVantageClient } from './services/alphavantage.js';
import { createLogger } from './helpers/logger.js';

const log = createLogger('SERVER');

const config = loadConfig();
const completion = new GeminiProvider(config.gemini);
// throws ConfigError when ALPHA_VANTAGE_API_KEY is missing
const marketData = new AlphaVantageClient(config.alphaVantage);

const app = createApp(config, {
  completion,
  marketData,
  maxTokens: config.chatMaxTokens,
  completionReady: () => completion.ready,
});

log.info(`Logging configured | level=${(process.env.LOG_LEVEL || 'info').toLowerCase()}`);
app.listen(config.port, () => log.info(`Backend running on http://localhost:${config.port}`));
