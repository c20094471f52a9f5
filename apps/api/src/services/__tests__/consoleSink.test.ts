import { describe, expect, it } from 'vitest';

import { SAFE_STATUS } from '@hearthwatch/engine';
import type { Alert } from '@hearthwatch/shared';
import { ConsoleAlertSink, formatAlert } from '../consoleSink.js';

const YELLOW = '\x1b[93m';
const RESET = '\x1b[0m';
const RULE = '='.repeat(70);

const knife: Alert = {
  type: 'KNIFE_UNATTENDED',
  severity: 'MEDIUM',
  message: 'Knife left out',
  voiceAlert: '',
  details: { confidence: 0.87, features: { near_person: false } },
  timestamp: '2026-03-14T18:00:00.000Z',
  frameNumber: 7,
};

const fire: Alert = {
  ...knife,
  type: 'FIRE_DETECTED',
  severity: 'CRITICAL',
  message: 'Fire',
  details: {},
};

function collect(audio = true): { sink: ConsoleAlertSink; out: string[] } {
  const out: string[] = [];
  return { sink: new ConsoleAlertSink({ audio, write: (text) => out.push(text) }), out };
}

describe('formatAlert', () => {
  it('renders a colored block with the details uncolored', () => {
    expect(formatAlert(knife).split('\n')).toEqual([
      `${YELLOW}${RULE}${RESET}`,
      `${YELLOW}[MEDIUM] KNIFE_UNATTENDED${RESET}`,
      `${YELLOW}Knife left out${RESET}`,
      `${YELLOW}Time: 2026-03-14T18:00:00.000Z${RESET}`,
      `${YELLOW}Frame: 7${RESET}`,
      `${YELLOW}Details:${RESET}`,
      '  - confidence: 0.87',
      '  - features: {"near_person":false}',
      `${YELLOW}${RULE}${RESET}`,
    ]);
  });

  it('leaves out the details header when there are none', () => {
    const lines = formatAlert(fire).split('\n');
    expect(lines).toHaveLength(6);
    expect(lines[1]).toBe('\x1b[91m[CRITICAL] FIRE_DETECTED\x1b[0m');
  });
});

describe('ConsoleAlertSink', () => {
  it('prints the all-clear for an empty batch', async () => {
    const { sink, out } = collect();
    await sink.deliver([], SAFE_STATUS);
    expect(out).toEqual(['\n[OK] No hazards detected. Kitchen is safe!\n']);
  });

  it('rings the bell according to severity', async () => {
    const { sink, out } = collect();
    await sink.deliver([fire, knife], SAFE_STATUS);
    expect(out).toEqual([
      '\n[!] SAFETY ALERT: 2 hazard(s) detected!\n',
      `\n${formatAlert(fire)}\n`,
      '\x07\x07\x07',
      `\n${formatAlert(knife)}\n`,
      '\x07\x07',
    ]);
  });

  it('stays quiet with audio off', async () => {
    const { sink, out } = collect(false);
    await sink.deliver([knife], SAFE_STATUS);
    expect(out).toEqual(['\n[!] SAFETY ALERT: 1 hazard(s) detected!\n', `\n${formatAlert(knife)}\n`]);
  });
});
