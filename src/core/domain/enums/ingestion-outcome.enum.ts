/**
 * Ingestion outcomes - every webhook request ends in exactly one of these
 */
export enum IngestionOutcome {
  /**
   * First verified, valid delivery of a message_id; a row was written
   */
  CREATED = 'created',

  /**
   * message_id already stored; nothing was written
   */
  DUPLICATE = 'duplicate',

  /**
   * Signature missing or wrong; payload was not inspected
   */
  INVALID_SIGNATURE = 'invalid_signature',

  /**
   * Signature valid but body failed parsing or field validation
   */
  INVALID_PAYLOAD = 'invalid_payload',
}

/**
 * Outcomes the store can report for an insert attempt
 */
export type InsertOutcome = IngestionOutcome.CREATED | IngestionOutcome.DUPLICATE;
