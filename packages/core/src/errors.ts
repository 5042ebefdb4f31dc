export class MalformedInputError extends Error {
  code = "MALFORMED_INPUT";
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class CorpusUnavailableError extends Error {
  code = "CORPUS_UNAVAILABLE";
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = "CorpusUnavailableError";
  }
}

export class RecordFormatError extends Error {
  code = "RECORD_FORMAT";
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = "RecordFormatError";
  }
}
