import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { once } from 'node:events';
import { DEFAULT_SAFETY_CONFIG, SafetyChecker } from '@hearthwatch/engine';
import type { SafetyConfig } from '@hearthwatch/shared';
import { createApp } from '../../app.js';
import { DailyAlertLog } from '../../services/alertLog.js';
import { FrameProcessor } from '../../services/frameProcessor.js';

export interface TestServer {
  url: string;
  checker: SafetyChecker;
  processor: FrameProcessor;
  alertLog: DailyAlertLog;
  close: () => Promise<void>;
}

/** Builds the API with no sinks over a temp log directory and listens on a free port. */
export async function startTestServer(config: Partial<SafetyConfig> = {}): Promise<TestServer> {
  const logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hearthwatch-api-'));
  const checker = new SafetyChecker({ ...DEFAULT_SAFETY_CONFIG, ...config });
  const processor = new FrameProcessor(checker);
  const alertLog = new DailyAlertLog(logDir);

  const server = createApp({ checker, processor, alertLog }).listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    checker,
    processor,
    alertLog,
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      fs.rmSync(logDir, { recursive: true, force: true });
    },
  };
}

export const knifeDetections = {
  frame_number: 7,
  detections: [
    { class: 'knife', confidence: 0.9, bbox: [390, 390, 410, 410], cropped_image_path: 'crops/knife_001.jpg' },
  ],
};

export const knifeClassifications = {
  classifications: { 'knife_001.jpg': { status: 'unattended', confidence: 0.87 } },
};

export function postJson(url: string, body: string, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body,
  });
}
