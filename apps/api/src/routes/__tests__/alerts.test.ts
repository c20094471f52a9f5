import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { Alert } from '@hearthwatch/shared';
import { knifeClassifications, knifeDetections, startTestServer, type TestServer } from './helpers.js';

const T0 = new Date('2026-03-14T18:00:00.000Z');

async function frameNumbers(url: string): Promise<unknown[]> {
  const body: unknown = await (await fetch(url)).json();
  if (typeof body !== 'object' || body === null) return [];
  const alerts: unknown = Reflect.get(body, 'alerts');
  if (!Array.isArray(alerts)) return [];
  return alerts.map((alert: unknown) =>
    typeof alert === 'object' && alert !== null ? Reflect.get(alert, 'frame_number') : null,
  );
}

describe('GET /api/alerts', () => {
  let api: TestServer;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    api = await startTestServer({ alertCooldownSec: 0 });
    for (const frame of [7, 8, 9]) {
      await api.processor.process({ ...knifeDetections, frame_number: frame }, knifeClassifications, T0);
    }
  });

  afterEach(async () => {
    await api.close();
    vi.restoreAllMocks();
  });

  it('lists recent alerts oldest first', async () => {
    const res = await fetch(`${api.url}/api/alerts`);
    expect(await res.json()).toHaveProperty('total', 3);
    expect(await frameNumbers(`${api.url}/api/alerts`)).toEqual([7, 8, 9]);
  });

  it('keeps the newest entries under a limit', async () => {
    expect(await frameNumbers(`${api.url}/api/alerts?limit=2`)).toEqual([8, 9]);
  });

  it('honours a zero limit and clamps negative ones to zero', async () => {
    expect(await frameNumbers(`${api.url}/api/alerts?limit=0`)).toEqual([]);
    expect(await frameNumbers(`${api.url}/api/alerts?limit=-5`)).toEqual([]);
  });

  it('falls back to the default for a non-numeric limit and caps large ones', async () => {
    expect(await frameNumbers(`${api.url}/api/alerts?limit=many`)).toEqual([7, 8, 9]);
    expect(await frameNumbers(`${api.url}/api/alerts?limit=9999`)).toEqual([7, 8, 9]);
  });
});

describe('GET /api/alerts/summary', () => {
  let api: TestServer;

  beforeEach(async () => {
    api = await startTestServer();
  });

  afterEach(async () => {
    await api.close();
  });

  it('summarizes the requested day from the log', async () => {
    const day = new Date(2026, 2, 14, 18);
    const alert: Alert = {
      type: 'FIRE_DETECTED',
      severity: 'CRITICAL',
      message: 'fire',
      voiceAlert: '',
      details: {},
      timestamp: day.toISOString(),
      frameNumber: 1,
    };
    await api.alertLog.append([alert, alert], day);

    const res = await fetch(`${api.url}/api/alerts/summary?date=20260314`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      date: '20260314',
      total: 2,
      byType: { FIRE_DETECTED: 2 },
      bySeverity: { CRITICAL: 2 },
    });
  });

  it('reports an empty day', async () => {
    const res = await fetch(`${api.url}/api/alerts/summary?date=20260101`);
    expect(await res.json()).toEqual({ date: '20260101', total: 0, byType: {}, bySeverity: {} });
  });

  it.each(['20260230', '2026-03-14', '202603', 'today'])('rejects %s', async (date) => {
    const res = await fetch(`${api.url}/api/alerts/summary?date=${date}`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'date must be YYYYMMDD' });
  });
});
