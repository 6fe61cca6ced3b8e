export class EntryNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Entry not found: ${path}`);
    this.name = 'EntryNotFoundError';
    this.path = path;
  }
}

export class LockContentionError extends Error {
  constructor(message = 'Source lock is already held') {
    super(message);
    this.name = 'LockContentionError';
  }
}

export class SourceClosedError extends Error {
  constructor(message = 'Source is closed') {
    super(message);
    this.name = 'SourceClosedError';
  }
}

export class ViewClosedError extends Error {
  constructor(message = 'View is closed') {
    super(message);
    this.name = 'ViewClosedError';
  }
}

export class ReconstructionUnavailableError extends Error {
  readonly format: string;

  constructor(format: string, path: string) {
    super(`No reconstruction strategy for format "${format}" (entry ${path})`);
    this.name = 'ReconstructionUnavailableError';
    this.format = format;
  }
}
