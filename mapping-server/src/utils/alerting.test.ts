import { describe, it, expect } from 'vitest';
import { Alerter, type WebhookFetch } from './alerting.js';

const WEBHOOK = 'https://discord.example/api/webhooks/test';

function recordingFetch(ok = true) {
  const bodies: unknown[] = [];
  const fetchImpl: WebhookFetch = async (_url, init) => {
    bodies.push(JSON.parse(init.body));
    return { ok };
  };
  return { bodies, fetchImpl };
}

function embedsOf(body: unknown): unknown[] {
  if (typeof body === 'object' && body !== null && 'embeds' in body && Array.isArray(body.embeds)) {
    return body.embeds;
  }
  return [];
}

describe('Alerter', () => {
  it('sends queued alerts in batches of ten embeds', async () => {
    const { bodies, fetchImpl } = recordingFetch();
    const alerter = new Alerter({ discordWebhookUrl: WEBHOOK, silent: true, flushDelayMs: 0, fetchImpl });

    for (let i = 0; i < 12; i++) {
      alerter.warning(`Warning ${i}`, 'store slow');
    }

    expect(await alerter.flush()).toBe(true);
    expect(bodies.map(body => embedsOf(body).length)).toEqual([10, 2]);
  });

  it('keeps a bounded history under a stream of failures', async () => {
    const { bodies, fetchImpl } = recordingFetch();
    const alerter = new Alerter({ discordWebhookUrl: WEBHOOK, silent: true, flushDelayMs: 0, fetchImpl });

    for (let i = 0; i < 5000; i++) {
      alerter.error('Mapping attempt not recorded', `attempt ${i}`);
    }

    const alerts = alerter.getAlerts();
    expect(alerts).toHaveLength(50);
    expect(alerts[0]?.message).toBe('attempt 4950');
    expect(alerts[49]?.message).toBe('attempt 4999');
    expect(alerter.hasErrors()).toBe(true);

    await alerter.flush();
    expect(bodies.map(body => embedsOf(body).length)).toEqual([10, 10, 10, 10, 10]);
  });

  it('limits embed fields to five details', async () => {
    const { bodies, fetchImpl } = recordingFetch();
    const alerter = new Alerter({ discordWebhookUrl: WEBHOOK, silent: true, flushDelayMs: 0, fetchImpl });

    alerter.error('Mapping attempt not recorded', 'connection refused', { a: 1, b: 2, c: 3, d: 4, e: 5, f: 6 });
    await alerter.flush();

    expect(embedsOf(bodies[0])).toEqual([
      {
        title: '❌ Mapping attempt not recorded',
        description: 'connection refused',
        color: 0xe74c3c,
        fields: ['a', 'b', 'c', 'd', 'e'].map((name, i) => ({ name, value: String(i + 1), inline: true })),
        timestamp: alerter.getAlerts()[0]?.timestamp,
      },
    ]);
  });

  it('reports a refused delivery', async () => {
    const { fetchImpl } = recordingFetch(false);
    const alerter = new Alerter({ discordWebhookUrl: WEBHOOK, silent: true, flushDelayMs: 0, fetchImpl });

    alerter.error('Learned mapping not stored', 'connection refused');

    expect(await alerter.flush()).toBe(false);
  });

  it('does nothing to flush without a webhook', async () => {
    const alerter = new Alerter({ silent: true });
    alerter.error('Store down', 'connection refused');

    expect(await alerter.flush()).toBe(false);
  });

  it('delivers pending alerts on close', async () => {
    const { bodies, fetchImpl } = recordingFetch();
    const alerter = new Alerter({ discordWebhookUrl: WEBHOOK, silent: true, fetchImpl });

    alerter.warning('Normalization rule skipped', 'Pattern ( is not a valid expression');
    await alerter.close();

    expect(bodies).toHaveLength(1);
  });

  it('derives an exit code from the worst alert', () => {
    const alerter = new Alerter({ silent: true });
    alerter.warning('w', 'w');
    expect(alerter.getExitCode()).toBe(0);
    expect(alerter.hasErrors()).toBe(false);

    alerter.error('e', 'e');
    expect(alerter.getExitCode()).toBe(1);
    expect(alerter.hasErrors()).toBe(true);
  });
});
