import { connect as connectTcp, type Socket } from "node:net";
import type { Readable, Writable } from "node:stream";
import { connect as connectTls } from "node:tls";
import { IrcError } from "../errors";
import type { IrcTransport, TransportConnector } from "../types";

const LINE_ENDING = "\r\n";

type PendingRead = {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
};

/**
 * Line-oriented transport over a separate read side and write side, so that
 * keepalive writes never wait on a pending read.
 */
export class SocketTransport implements IrcTransport {
  private buffer = "";
  private lines: string[] = [];
  private pending: PendingRead[] = [];
  private ended = false;
  private failure: Error | null = null;
  private readonly input: Readable;
  private readonly output: Writable;

  constructor(input: Readable, output: Writable) {
    this.input = input;
    this.output = output;

    input.setEncoding("utf8");
    input.on("data", (chunk: string) => this.receive(chunk));
    input.on("end", () => this.end());
    input.on("close", () => this.end());
    input.on("error", (error: Error) => this.fail(error));
    if (output !== input) {
      output.on("error", (error: Error) => this.fail(error));
    }
  }

  readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  write(data: string) {
    return new Promise<void>((resolve, reject) => {
      if (this.output.destroyed || this.output.writableEnded) {
        reject(new IrcError("transport", "Connection is closed."));
        return;
      }
      this.output.write(data, "utf8", (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  async close() {
    if (!this.output.writableEnded && !this.output.destroyed) {
      await new Promise<void>((resolve) => this.output.end(() => resolve()));
    }
    this.input.destroy();
    this.end();
  }

  private receive(chunk: string) {
    this.buffer += chunk;
    let index = this.buffer.indexOf(LINE_ENDING);
    while (index !== -1) {
      this.deliver(this.buffer.slice(0, index + LINE_ENDING.length));
      this.buffer = this.buffer.slice(index + LINE_ENDING.length);
      index = this.buffer.indexOf(LINE_ENDING);
    }
  }

  private deliver(line: string) {
    const reader = this.pending.shift();
    if (reader) reader.resolve(line);
    else this.lines.push(line);
  }

  private end() {
    if (this.ended) return;
    this.ended = true;
    // An unterminated tail is still handed out so the parser can report it.
    if (this.buffer) {
      this.deliver(this.buffer);
      this.buffer = "";
    }
    for (const reader of this.pending.splice(0)) reader.resolve(null);
  }

  private fail(error: Error) {
    if (this.failure) return;
    this.failure = error;
    for (const reader of this.pending.splice(0)) reader.reject(error);
  }
}

export const connectSocket: TransportConnector = ({ host, port, tls }) =>
  new Promise((resolve, reject) => {
    const socket: Socket = tls ? connectTls({ host, port, servername: host }) : connectTcp({ host, port });
    const onError = (error: Error) => {
      reject(new IrcError("transport", `Could not connect to ${host}:${port}: ${error.message}`, { cause: error }));
    };
    socket.once("error", onError);
    socket.once(tls ? "secureConnect" : "connect", () => {
      socket.off("error", onError);
      resolve(new SocketTransport(socket, socket));
    });
  });
