import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import {
  APP_OPTIONS,
  configureApp,
  InboxModule,
  InMemoryStorageAdapter,
  computeSignature,
} from '../../src';

const SECRET = 'test-secret';

function sign(body: string): string {
  return computeSignature(Buffer.from(body), SECRET);
}

describe('Inbox over HTTP', () => {
  let app: NestExpressApplication;
  let storageAdapter: InMemoryStorageAdapter;
  let baseUrl: string;

  beforeEach(async () => {
    storageAdapter = new InMemoryStorageAdapter();
    app = await NestFactory.create<NestExpressApplication>(
      InboxModule.forRoot({
        webhookSecret: SECRET,
        storage: { type: 'custom', adapter: storageAdapter },
      }),
      { ...APP_OPTIONS, logger: false },
    );
    configureApp(app);
    await app.listen(0, '127.0.0.1');
    baseUrl = await app.getUrl();
  });

  afterEach(async () => {
    await app.close();
  });

  function postWebhook(
    body: string,
    signature: string,
    contentType = 'application/json',
  ): Promise<Response> {
    return fetch(`${baseUrl}/webhook`, {
      method: 'POST',
      headers: { 'Content-Type': contentType, 'X-Signature': signature },
      body,
    });
  }

  // Key order and spacing that a JSON re-serialisation would not keep
  const body =
    '{ "ts":"2025-01-15T10:00:00Z",  "message_id":"h1",\n' +
    '  "from":"+919876543210", "to":"+14155550100", "text":"Hi" }';

  it('should verify the signature over the exact bytes received', async () => {
    const res = await postWebhook(body, sign(body));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
    expect(storageAdapter.size()).toBe(1);
  });

  it('should keep the body raw whatever the declared content type', async () => {
    const res = await postWebhook(body, sign(body), 'text/plain');

    expect(res.status).toBe(200);
    expect(storageAdapter.size()).toBe(1);
  });

  it('should reject a body that differs from the signed bytes only in whitespace', async () => {
    const signature = sign(body);

    const res = await postWebhook(body.replace(/\s+/g, ''), signature);

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ detail: 'invalid signature' });
    expect(storageAdapter.size()).toBe(0);
  });

  it('should answer 422 for signed malformed JSON', async () => {
    const malformed = '{"message_id": ';

    const res = await postWebhook(malformed, sign(malformed));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ field: 'body', messages: ['body must be valid JSON'] }],
    });
  });

  it('should list a message stored through the webhook', async () => {
    await postWebhook(body, sign(body));

    const res = await fetch(`${baseUrl}/messages?q=hi`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: [
        {
          message_id: 'h1',
          from: '+919876543210',
          to: '+14155550100',
          ts: '2025-01-15T10:00:00Z',
          text: 'Hi',
        },
      ],
      total: 1,
      limit: 50,
      offset: 0,
    });
  });

  it('should reject a limit below one with 422', async () => {
    const res = await fetch(`${baseUrl}/messages?limit=0`);

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ field: 'limit', messages: ['limit must not be less than 1'] }],
    });
  });
});
