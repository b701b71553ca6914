export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class TractorSpoolError extends Error {
  constructor(
    message: string,
    readonly stdout: string = "",
    readonly stderr: string = ""
  ) {
    super(message);
    this.name = "TractorSpoolError";
  }
}

export class SubtaskStreamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubtaskStreamError";
  }
}

export class UnknownSubmitterError extends Error {
  constructor(readonly submitterName: string) {
    super(`unknown submitter: ${submitterName}`);
    this.name = "UnknownSubmitterError";
  }
}

export class InvalidGraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGraphError";
  }
}
