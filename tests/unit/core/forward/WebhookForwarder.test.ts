import { describe, it, expect, vi } from 'vitest';
import { WebhookForwarder } from '../../../../src/core/forward/WebhookForwarder.js';
import { signBody } from '../../../../src/core/forward/signature.js';
import { TransportError } from '../../../../src/infra/errors.js';
import { createMockLogger } from '../../../helpers/logger.js';

const URL = 'http://relay.test/wh';
const body = Buffer.from('{"event_type":"message","text":"hola"}');

describe('WebhookForwarder', () => {
  it('signs the body and retries until a 2xx', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response(null, { status: 500 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    const forwarder = new WebhookForwarder(
      { url: URL, secret: 'test-secret', headers: { 'X-Tenant': 'demo' }, baseDelayMs: 1, fetchImpl },
      createMockLogger(),
    );

    await forwarder.deliver(body);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(fetchImpl).toHaveBeenLastCalledWith(
      URL,
      expect.objectContaining({
        method: 'POST',
        body,
        headers: expect.objectContaining({
          'Content-Type': 'application/json',
          'X-Tenant': 'demo',
          'X-Relay-Signature': signBody('test-secret', body),
          'X-Relay-Timestamp': expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/),
        }),
      }),
    );
  });

  it('reads every response body to the end', async () => {
    const failed = new Response('busy', { status: 503 });
    const accepted = new Response('{"ok":true}', { status: 200 });
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(failed).mockResolvedValueOnce(accepted);
    const forwarder = new WebhookForwarder({ url: URL, baseDelayMs: 1, fetchImpl }, createMockLogger());

    await forwarder.deliver(body);

    expect(failed.bodyUsed).toBe(true);
    expect(accepted.bodyUsed).toBe(true);
  });

  it('gives up after three attempts with the last failure', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => new Response(null, { status: 503 }));
    const forwarder = new WebhookForwarder({ url: URL, baseDelayMs: 1, fetchImpl }, createMockLogger());

    const result = forwarder.deliver(body);
    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toThrow('webhook non-2xx: 503');
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('omits the signature header without a secret', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));
    const forwarder = new WebhookForwarder({ url: URL, fetchImpl }, createMockLogger());

    await forwarder.deliver(body);

    expect(fetchImpl).toHaveBeenCalledWith(
      URL,
      expect.objectContaining({ headers: expect.not.objectContaining({ 'X-Relay-Signature': expect.anything() }) }),
    );
  });

  it('turns a hung request into a timeout failure', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const forwarder = new WebhookForwarder({ url: URL, attempts: 1, timeoutMs: 10, fetchImpl }, createMockLogger());

    await expect(forwarder.deliver(body)).rejects.toThrow('webhook timed out after 10ms');
  });

  it('logs a detached failure and drains', async () => {
    const logger = createMockLogger();
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new Error('connection refused'));
    const forwarder = new WebhookForwarder({ url: URL, attempts: 2, baseDelayMs: 1, fetchImpl }, logger);

    forwarder.forward(body);
    expect(forwarder.pending).toBe(1);
    await expect(forwarder.drain(1000)).resolves.toBe(true);

    expect(forwarder.pending).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Webhook', 'webhook post failed: connection refused');
  });
});
