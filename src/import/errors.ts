/**
 * The input document could not be read, is not JSON, or is not an array of
 * records. Aborts the whole run.
 */
export class ImportDocumentError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'ImportDocumentError';
  }
}

/** A record without a string `table` discriminator. Aborts the whole run. */
export class MissingTableError extends Error {
  constructor(readonly index: number, readonly key: string) {
    super(`Record #${index} (guid ${key}) has no "table" field`);
    this.name = 'MissingTableError';
  }
}
