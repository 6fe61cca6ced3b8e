export class InvalidContainerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidContainerError';
  }
}

export class MalformedIconError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'MalformedIconError';
    this.cause = cause;
  }
}

export class ReaderClosedError extends Error {
  constructor() {
    super('Reader is closed');
    this.name = 'ReaderClosedError';
  }
}
