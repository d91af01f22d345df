import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { WebhookMessageDto, ListMessagesQueryDto } from '../../src';

async function violatedFields(
  payload: Record<string, unknown>,
): Promise<string[]> {
  const errors = await validate(plainToInstance(WebhookMessageDto, payload));
  return errors.map((e) => e.property).sort();
}

describe('WebhookMessageDto', () => {
  const valid = {
    message_id: 'm1',
    from: '+919876543210',
    to: '+14155550100',
    ts: '2025-01-15T10:00:00Z',
    text: 'Hello',
  };

  it('should accept a complete message', async () => {
    expect(await violatedFields(valid)).toEqual([]);
  });

  it('should accept a message without text, or with null or empty text', async () => {
    const { text: _text, ...withoutText } = valid;
    expect(await violatedFields(withoutText)).toEqual([]);
    expect(await violatedFields({ ...valid, text: null })).toEqual([]);
    expect(await violatedFields({ ...valid, text: '' })).toEqual([]);
  });

  it('should require message_id, from, to and ts', async () => {
    expect(await violatedFields({})).toEqual(['from', 'message_id', 'to', 'ts']);
  });

  it('should reject an empty message_id', async () => {
    expect(await violatedFields({ ...valid, message_id: '' })).toEqual([
      'message_id',
    ]);
  });

  it.each([
    ['no plus sign', '919876543210'],
    ['leading zero', '+0123456'],
    ['letters', '+91abc'],
    ['sixteen digits', '+1234567890123456'],
    ['plus only', '+'],
  ])('should reject a sender with %s', async (_case, from) => {
    expect(await violatedFields({ ...valid, from })).toEqual(['from']);
  });

  it('should accept the longest E.164 number', async () => {
    expect(await violatedFields({ ...valid, to: '+123456789012345' })).toEqual(
      [],
    );
  });

  it('should explain the expected sender format', async () => {
    const errors = await validate(
      plainToInstance(WebhookMessageDto, { ...valid, from: 'abc' }),
    );
    expect(errors[0].constraints?.matches).toBe(
      'from must be E.164 format: + followed by digits',
    );
  });

  it.each([
    ['a date only', '2025-01-15'],
    ['an offset', '2025-01-15T10:00:00+02:00'],
    ['fractional seconds', '2025-01-15T10:00:00.123Z'],
    ['no zone', '2025-01-15T10:00:00'],
    ['an impossible date', '2025-02-30T10:00:00Z'],
    ['free text', 'yesterday'],
  ])('should reject a ts with %s', async (_case, ts) => {
    expect(await violatedFields({ ...valid, ts })).toEqual(['ts']);
  });

  it('should reject text longer than 4096 characters', async () => {
    expect(
      await violatedFields({ ...valid, text: 'x'.repeat(4097) }),
    ).toEqual(['text']);
    expect(await violatedFields({ ...valid, text: 'x'.repeat(4096) })).toEqual(
      [],
    );
  });

  it('should reject non-string fields', async () => {
    expect(
      await violatedFields({ ...valid, message_id: 42, text: 7 }),
    ).toEqual(['message_id', 'text']);
  });
});

describe('ListMessagesQueryDto', () => {
  async function queryViolations(query: Record<string, string>): Promise<string[]> {
    const errors = await validate(plainToInstance(ListMessagesQueryDto, query));
    return errors.map((e) => e.property).sort();
  }

  it('should apply defaults for limit and offset', () => {
    const dto = plainToInstance(ListMessagesQueryDto, {});
    expect(dto.limit).toBe(50);
    expect(dto.offset).toBe(0);
  });

  it('should coerce numeric query strings', () => {
    const dto = plainToInstance(ListMessagesQueryDto, { limit: '5', offset: '10' });
    expect(dto.limit).toBe(5);
    expect(dto.offset).toBe(10);
  });

  it('should accept valid filters', async () => {
    expect(
      await queryViolations({
        limit: '100',
        offset: '0',
        from: '+919876543210',
        since: '2025-01-15T09:30:00Z',
        q: 'hello',
      }),
    ).toEqual([]);
  });

  it('should reject out-of-range and non-numeric paging', async () => {
    expect(await queryViolations({ limit: '0' })).toEqual(['limit']);
    expect(await queryViolations({ limit: '101' })).toEqual(['limit']);
    expect(await queryViolations({ limit: 'ten' })).toEqual(['limit']);
    expect(await queryViolations({ offset: '-1' })).toEqual(['offset']);
  });

  it('should reject malformed filters', async () => {
    expect(await queryViolations({ from: '12345' })).toEqual(['from']);
    expect(await queryViolations({ since: '2025-01-15' })).toEqual(['since']);
    expect(await queryViolations({ q: '' })).toEqual(['q']);
    expect(await queryViolations({ q: 'x'.repeat(257) })).toEqual(['q']);
  });
});
