import dotenv from 'dotenv';
import { loadConfig, validateConfig } from './config/env';
import { BotEngine, createPorts } from './core/bot';
import { Logger } from './utils/logger';

async function main() {
  dotenv.config();
  Logger.info('Booting prediction sniper...');

  // 1. Config is read once and frozen; nothing below touches process.env
  const config = loadConfig(process.env);
  validateConfig(config);

  // 2. Wire and start
  const bot = new BotEngine(config, createPorts(config));
  await bot.start();

  // 3. Handle Shutdown Gracefully
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    Logger.info(`Received ${signal}`);
    try {
      await bot.stop();
      process.exit(0);
    } catch (err) {
      Logger.error('Shutdown failed', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch(err => {
  Logger.error('Fatal Boot Error', err);
  process.exit(1);
});
