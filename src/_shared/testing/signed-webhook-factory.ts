import { computeSignature, SIGNATURE_HEADER } from '../../core/signature';

export const DEFAULT_TEST_SECRET = 'test-secret';

/**
 * Message fields as they travel on the wire
 */
export interface WebhookMessageFields {
  message_id: string;
  from: string;
  to: string;
  ts: string;
  text?: string | null;
}

/**
 * Options for webhook generation
 */
export interface WebhookOptions {
  secret?: string;
  messageId?: string;
  from?: string;
  to?: string;
  ts?: string;
  text?: string | null;
}

/**
 * Generated webhook request
 */
export interface SignedWebhook {
  body: Buffer;
  headers: Record<string, string>;
  message: WebhookMessageFields;
}

/**
 * Factory for signed webhook requests
 * Used for testing ingestion without a real sender
 */
export class SignedWebhookFactory {
  /**
   * A valid, correctly signed message
   */
  static message(options: WebhookOptions = {}): SignedWebhook {
    const message: WebhookMessageFields = {
      message_id: options.messageId ?? this.generateId('msg'),
      from: options.from ?? '+919876543210',
      to: options.to ?? '+14155550100',
      ts: options.ts ?? '2025-01-15T10:00:00Z',
    };
    if (options.text !== undefined) {
      message.text = options.text;
    }

    return this.sign(Buffer.from(JSON.stringify(message)), message, options.secret);
  }

  /**
   * Sign an arbitrary raw body, for payloads that should fail validation
   */
  static raw(
    body: string | Buffer,
    secret = DEFAULT_TEST_SECRET,
  ): Omit<SignedWebhook, 'message'> {
    const buffer = Buffer.isBuffer(body) ? body : Buffer.from(body);
    return { body: buffer, headers: this.headersFor(buffer, secret) };
  }

  /**
   * A valid payload carrying a signature that does not match
   */
  static invalidSignature(options: WebhookOptions = {}): SignedWebhook {
    const webhook = this.message(options);
    return {
      ...webhook,
      headers: {
        'content-type': 'application/json',
        [SIGNATURE_HEADER]: 'invalidsig',
      },
    };
  }

  /**
   * A valid payload without any signature header
   */
  static unsigned(options: WebhookOptions = {}): SignedWebhook {
    const webhook = this.message(options);
    return {
      ...webhook,
      headers: { 'content-type': 'application/json' },
    };
  }

  /**
   * Re-deliver a webhook byte for byte
   */
  static duplicate(original: SignedWebhook): SignedWebhook {
    return {
      body: Buffer.from(original.body),
      headers: { ...original.headers },
      message: { ...original.message },
    };
  }

  /**
   * Distinct messages, one per sender in rotation, one minute apart
   */
  static batch(
    count: number,
    senders: string[] = ['+15550000001', '+15550000002'],
    options: WebhookOptions = {},
  ): SignedWebhook[] {
    const base = Date.parse('2025-01-15T10:00:00Z');
    const webhooks: SignedWebhook[] = [];

    for (let i = 0; i < count; i++) {
      webhooks.push(
        this.message({
          ...options,
          messageId: `${options.messageId ?? 'batch'}_${i}`,
          from: senders[i % senders.length],
          ts: new Date(base + i * 60_000).toISOString().replace('.000Z', 'Z'),
        }),
      );
    }

    return webhooks;
  }

  private static sign(
    body: Buffer,
    message: WebhookMessageFields,
    secret = DEFAULT_TEST_SECRET,
  ): SignedWebhook {
    return { body, headers: this.headersFor(body, secret), message };
  }

  private static headersFor(body: Buffer, secret: string): Record<string, string> {
    return {
      'content-type': 'application/json',
      [SIGNATURE_HEADER]: computeSignature(body, secret),
    };
  }

  private static generateId(prefix: string): string {
    return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }
}

/**
 * Test helper for webhook scenarios
 */
export class WebhookScenarios {
  /**
   * Same delivery twice
   */
  static idempotency(options: WebhookOptions = {}): {
    original: SignedWebhook;
    duplicate: SignedWebhook;
  } {
    const original = SignedWebhookFactory.message(options);
    return { original, duplicate: SignedWebhookFactory.duplicate(original) };
  }

  /**
   * Signature verification cases over one payload
   */
  static signatureVerification(options: WebhookOptions = {}): {
    valid: SignedWebhook;
    invalid: SignedWebhook;
    unsigned: SignedWebhook;
  } {
    const messageId = options.messageId ?? 'sig-check';
    return {
      valid: SignedWebhookFactory.message({ ...options, messageId }),
      invalid: SignedWebhookFactory.invalidSignature({ ...options, messageId }),
      unsigned: SignedWebhookFactory.unsigned({ ...options, messageId }),
    };
  }
}
