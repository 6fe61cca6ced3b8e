export type Namespace = 'Reader';

export interface Logger {
  info(msg: string): void;
  warn(msg: string, err?: unknown): void;
  error(msg: string, err?: unknown): void;
}

export function createLogger(namespace: Namespace): Logger {
  const prefix = `[Cartkit:${namespace}]`;
  return {
    info: (msg: string) => console.debug(`${prefix} ${msg}`),
    warn: (msg: string, err?: unknown) =>
      err ? console.warn(`${prefix} ${msg}`, err) : console.warn(`${prefix} ${msg}`),
    error: (msg: string, err?: unknown) =>
      err ? console.error(`${prefix} ${msg}`, err) : console.error(`${prefix} ${msg}`),
  };
}
