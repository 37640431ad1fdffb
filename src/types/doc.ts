/** Envelope shared by every catalog record: a unique docId, a docType tag, and the record itself. */
export type Doc<T extends string, D> = {
  docId: string;
  docType: T;
  data: D;
};
