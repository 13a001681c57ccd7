export class MalformedHistoryFileError extends Error {
  name = "MalformedHistoryFileError";
  constructor(reason: string) {
    super(`Malformed history file: ${reason}`);
  }
}
