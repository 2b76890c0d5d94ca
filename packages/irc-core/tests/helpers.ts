import type { IrcTransport } from "../src/types";

export const failureOf = (run: () => unknown) => {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
};

/**
 * In-process transport fed from a script. Reads wait for `push` or `finish`
 * once the script runs out; every operation is recorded in `log`.
 */
export class ScriptedTransport implements IrcTransport {
  readonly log: string[] = [];
  readonly written: string[] = [];
  private readonly lines: string[];
  private done = false;
  private failure: Error | null = null;
  private writeFailure: Error | null = null;
  private waiting: { resolve: (line: string | null) => void; reject: (error: Error) => void } | null = null;

  constructor(lines: string[] = []) {
    this.lines = [...lines];
  }

  push(line: string) {
    if (this.waiting) {
      this.waiting.resolve(line);
      this.waiting = null;
    } else {
      this.lines.push(line);
    }
  }

  finish() {
    this.done = true;
    this.waiting?.resolve(null);
    this.waiting = null;
  }

  fail(error: Error) {
    this.failure = error;
    this.waiting?.reject(error);
    this.waiting = null;
  }

  /** Makes every later write reject with `error`. */
  failWrites(error: Error) {
    this.writeFailure = error;
  }

  readLine(): Promise<string | null> {
    this.log.push("read");
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.failure) return Promise.reject(this.failure);
    if (this.done) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  write(data: string) {
    this.log.push(`write ${data}`);
    if (this.writeFailure) return Promise.reject(this.writeFailure);
    this.written.push(data);
    return Promise.resolve();
  }

  close() {
    this.log.push("close");
    this.finish();
    return Promise.resolve();
  }
}
