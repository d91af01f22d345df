/**
 * Message domain model - an inbound message as it was accepted by the webhook.
 * Messages are write-once: there is no update or delete path.
 */
export class Message {
  constructor(
    public readonly messageId: string,
    public readonly sender: string,
    public readonly recipient: string,
    public readonly timestamp: string,
    public readonly text: string | null = null,
    public readonly receivedAt: Date = new Date(),
  ) {}

  /**
   * Case-insensitive substring match on the message text
   */
  textContains(needle: string): boolean {
    if (this.text === null) {
      return false;
    }
    return this.text.toLowerCase().includes(needle.toLowerCase());
  }
}
