import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SAFE_STATUS } from '@hearthwatch/engine';
import type { Alert } from '@hearthwatch/shared';
import { DailyAlertLog, dayStamp, formatSummary } from '../alertLog.js';

const DAY = new Date(2026, 2, 14, 18, 0, 0);

function alert(type: Alert['type'], severity: Alert['severity']): Alert {
  return {
    type,
    severity,
    message: `${type} message`,
    voiceAlert: `${type} voice`,
    details: { confidence: 0.9 },
    timestamp: '2026-03-14T18:00:00.000Z',
    frameNumber: 12,
  };
}

describe('dayStamp', () => {
  it('pads month and day', () => {
    expect(dayStamp(new Date(2026, 2, 4))).toBe('20260304');
    expect(dayStamp(new Date(2026, 11, 31, 23, 59))).toBe('20261231');
  });
});

describe('DailyAlertLog', () => {
  let dir: string;
  let log: DailyAlertLog;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hearthwatch-log-'));
    log = new DailyAlertLog(path.join(dir, 'logs'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('names one file per day', () => {
    expect(log.fileFor(DAY)).toBe(path.join(dir, 'logs', 'alerts_20260314.json'));
  });

  it('reads an empty list for a day with no file', async () => {
    expect(await log.read(DAY)).toEqual([]);
  });

  it('appends snake_case records across batches', async () => {
    await log.append([alert('FIRE_DETECTED', 'CRITICAL')], DAY);
    await log.append([alert('KNIFE_UNATTENDED', 'MEDIUM')], DAY);

    const records = await log.read(DAY);
    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      type: 'FIRE_DETECTED',
      severity: 'CRITICAL',
      message: 'FIRE_DETECTED message',
      voice_alert: 'FIRE_DETECTED voice',
      details: { confidence: 0.9 },
      timestamp: '2026-03-14T18:00:00.000Z',
      frame_number: 12,
    });
    expect(records[1]?.type).toBe('KNIFE_UNATTENDED');
  });

  it('keeps concurrent appends from overwriting each other', async () => {
    await Promise.all([
      log.append([alert('FIRE_DETECTED', 'CRITICAL')], DAY),
      log.append([alert('SMOKE_DETECTED', 'CRITICAL')], DAY),
      log.append([alert('PAN_OVERHEATING', 'HIGH')], DAY),
    ]);
    const records = await log.read(DAY);
    expect(records.map((r) => r.type)).toEqual(['FIRE_DETECTED', 'SMOKE_DETECTED', 'PAN_OVERHEATING']);
  });

  it('starts a new array over a corrupt file', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    fs.mkdirSync(log.getLogDir(), { recursive: true });
    fs.writeFileSync(log.fileFor(DAY), '[{"type": ');

    expect(await log.read(DAY)).toEqual([]);
    await log.append([alert('STOVE_UNATTENDED', 'HIGH')], DAY);
    expect((await log.read(DAY)).map((r) => r.type)).toEqual(['STOVE_UNATTENDED']);
    expect(warn).toHaveBeenCalledWith(`[alert-log] ${log.fileFor(DAY)} is not valid JSON, starting a new array`);
  });

  it('files a delivered batch under the day it was stamped', async () => {
    const lateEvening = new Date(2026, 2, 14, 23, 59, 59);
    await log.deliver([{ ...alert('SMOKE_DETECTED', 'CRITICAL'), timestamp: lateEvening.toISOString() }], SAFE_STATUS);

    expect(fs.readdirSync(log.getLogDir())).toEqual(['alerts_20260314.json']);
    expect((await log.read(DAY)).map((r) => r.type)).toEqual(['SMOKE_DETECTED']);
  });

  it('writes nothing for an empty batch', async () => {
    await log.deliver([], SAFE_STATUS);
    expect(fs.existsSync(log.getLogDir())).toBe(false);
  });

  it('summarizes a day by type and severity', async () => {
    await log.append(
      [
        alert('STOVE_TOO_FAR', 'MEDIUM'),
        alert('KNIFE_UNATTENDED', 'MEDIUM'),
        alert('STOVE_TOO_FAR', 'MEDIUM'),
        alert('FIRE_DETECTED', 'CRITICAL'),
      ],
      DAY,
    );
    expect(await log.getSummary(DAY)).toEqual({
      date: '20260314',
      total: 4,
      byType: { STOVE_TOO_FAR: 2, KNIFE_UNATTENDED: 1, FIRE_DETECTED: 1 },
      bySeverity: { MEDIUM: 3, CRITICAL: 1 },
    });
  });
});

describe('formatSummary', () => {
  const rule = '='.repeat(60);

  it('reports a quiet day', () => {
    const text = formatSummary({ date: '20260314', total: 0, byType: {}, bySeverity: {} });
    expect(text.split('\n')).toEqual([
      rule,
      '[SUMMARY] ALERTS FOR 20260314',
      rule,
      'Total alerts: 0',
      '[OK] No alerts today - kitchen has been safe!',
      rule,
    ]);
  });

  it('lists the counts', () => {
    const text = formatSummary({
      date: '20260314',
      total: 3,
      byType: { STOVE_TOO_FAR: 2, FIRE_DETECTED: 1 },
      bySeverity: { MEDIUM: 2, CRITICAL: 1 },
    });
    expect(text.split('\n')).toEqual([
      rule,
      '[SUMMARY] ALERTS FOR 20260314',
      rule,
      'Total alerts: 3',
      '',
      'By type:',
      '  - STOVE_TOO_FAR: 2',
      '  - FIRE_DETECTED: 1',
      '',
      'By severity:',
      '  - MEDIUM: 2',
      '  - CRITICAL: 1',
      rule,
    ]);
  });
});
