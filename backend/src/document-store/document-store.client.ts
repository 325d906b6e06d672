export const DOCUMENT_STORE_CLIENT = Symbol('DOCUMENT_STORE_CLIENT');

export type DocumentValue = string | number | boolean | Date | null;

export type DocumentFields = Record<string, DocumentValue>;

export interface DocumentStoreClient {
  /**
   * Replaces the document at `documentPath` (e.g. `users/u1/recordings/r1`)
   * with `fields`, creating it when absent.
   */
  write(documentPath: string, fields: DocumentFields): Promise<void>;
}
