export class RecordNotFoundError extends Error {
  name = "RecordNotFoundError";
  constructor(public recordId: string) {
    super(`Record not found: ${recordId}`);
  }
}

export class CorruptRecordError extends Error {
  name = "CorruptRecordError";
  constructor(public recordId: string, reason: string) {
    super(`Record ${recordId} has an invalid stored value: ${reason}`);
  }
}
