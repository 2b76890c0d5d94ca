export type IrcErrorKind =
  | "no-match"
  | "no-command"
  | "invalid"
  | "missing-parameter"
  | "ordering"
  | "transport";

export type IrcErrorOptions = {
  line?: string;
  cause?: unknown;
};

export class IrcError extends Error {
  readonly kind: IrcErrorKind;
  readonly line?: string;

  constructor(kind: IrcErrorKind, message: string, options: IrcErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "IrcError";
    this.kind = kind;
    this.line = options.line;
  }
}

export const isIrcError = (value: unknown): value is IrcError => value instanceof IrcError;

export const toIrcError = (kind: IrcErrorKind, error: unknown): IrcError => {
  if (isIrcError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new IrcError(kind, message, { cause: error });
};

export const withLine = (error: IrcError, line: string) =>
  error.line === undefined ? new IrcError(error.kind, error.message, { line, cause: error.cause }) : error;
