import 'dotenv/config';
import { createServer } from 'node:http';
import { connectDB, disconnectDB } from '@hearthwatch/db';
import { loadSafetyConfig, SafetyChecker } from '@hearthwatch/engine';
import { createApp } from './app.js';
import { FrameProcessor } from './services/frameProcessor.js';
import { ConsoleAlertSink } from './services/consoleSink.js';
import { DailyAlertLog } from './services/alertLog.js';
import { MongoAlertSink } from './services/alertStore.js';
import { createAlertWSS } from './ws/alertStream.js';

const PORT = Number(process.env.PORT) || 4000;

async function start() {
  const config = loadSafetyConfig(process.env.SAFETY_CONFIG_PATH);
  const checker = new SafetyChecker(config);
  console.log(
    `[api] safe distance ${config.safeDistanceThreshold}px, confidence floor ${config.confidenceThreshold}, ` +
      `cooldown ${config.alertCooldownSec}s, knife distance ${config.knifeDangerDistance}px`,
  );

  const alertLog = new DailyAlertLog(process.env.ALERT_LOG_DIR || 'outputs/logs');
  const processor = new FrameProcessor(checker, [
    new ConsoleAlertSink({ audio: process.env.ALERT_AUDIO !== 'false' }),
    alertLog,
  ]);

  // MongoDB is optional: without it alerts only go to the daily JSON log
  const mongoUri = process.env.MONGODB_URI;
  if (mongoUri) {
    try {
      await connectDB(mongoUri);
      processor.addSink(new MongoAlertSink());
      console.log('[api] Connected to MongoDB, alert records enabled');
    } catch (err) {
      console.error('[api] MongoDB connection failed:', err);
      process.exit(1);
    }
  }

  const server = createServer(createApp({ checker, processor, alertLog }));
  const alertStream = createAlertWSS(server);
  processor.addSink(alertStream.sink);

  server.listen(PORT, () => {
    console.log(`[api] listening on port ${PORT}`);
  });

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, () => {
      console.log(`[api] ${sig} received, shutting down...`);
      alertStream.close();
      server.close();
      const done = mongoUri ? disconnectDB() : Promise.resolve();
      done
        .catch((err) => console.error('[api] MongoDB disconnect failed:', err))
        .finally(() => process.exit(0));
    });
  }
}

start().catch((err) => {
  console.error('[api] Failed to start:', err);
  process.exit(1);
});
