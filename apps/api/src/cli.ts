import 'dotenv/config';
import fs from 'node:fs';
import { parseArgs } from 'node:util';
import { loadSafetyConfig, SafetyChecker } from '@hearthwatch/engine';
import { FrameProcessor } from './services/frameProcessor.js';
import { ConsoleAlertSink } from './services/consoleSink.js';
import { DailyAlertLog, formatSummary } from './services/alertLog.js';
import type { AlertSink } from './services/alertSink.js';

const USAGE =
  'Usage: hearthwatch-frame <detections.json> <classifications.json> [--config file] [--log-dir dir] [--no-audio] [--no-log]';

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      'log-dir': { type: 'string' },
      'no-audio': { type: 'boolean', default: false },
      'no-log': { type: 'boolean', default: false },
    },
  });

  const [detectionsPath, classificationsPath] = positionals;
  if (!detectionsPath || !classificationsPath) {
    console.error(USAGE);
    return 1;
  }

  let rawDetections: unknown;
  let rawClassifications: unknown;
  try {
    rawDetections = readJson(detectionsPath);
    rawClassifications = readJson(classificationsPath);
  } catch (err) {
    console.error('[cli] could not read input:', err instanceof Error ? err.message : err);
    return 1;
  }

  const config = loadSafetyConfig(values.config ?? process.env.SAFETY_CONFIG_PATH);
  const alertLog = new DailyAlertLog(values['log-dir'] ?? process.env.ALERT_LOG_DIR ?? 'outputs/logs');
  const sinks: AlertSink[] = [new ConsoleAlertSink({ audio: !values['no-audio'] })];
  if (!values['no-log']) sinks.push(alertLog);

  const processor = new FrameProcessor(new SafetyChecker(config), sinks);
  const result = await processor.process(rawDetections, rawClassifications);
  if (!result.ok) {
    console.error('[cli] invalid input:');
    for (const issue of result.error.issues) console.error(`  - ${issue}`);
    return 1;
  }

  console.log(`\n[STATUS] ${result.status.status}: ${result.status.message}`);
  if (!values['no-log']) {
    console.log(`[LOG] Alerts logged to: ${alertLog.getLogDir()}`);
    console.log(`\n${formatSummary(await alertLog.getSummary())}`);
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[cli] failed:', err);
    process.exitCode = 1;
  });
